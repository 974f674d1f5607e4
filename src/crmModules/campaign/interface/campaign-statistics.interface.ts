export interface ICampaignStatistics {
  totalCampaigns: number;
  byStatus: Record<string, number>;
  totalBudget: number;
  totalSpent: number;
  totalRevenue: number;
  overallRoi: number;
  totalProspects: number;
  totalConversions: number;
  averageConversionRate: number;
}
