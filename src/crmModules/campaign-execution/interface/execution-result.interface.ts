export interface SendTally {
  attempted: number;
  sentCount: number;
  failedCount: number;
  skippedCount: number;
}

export interface ExecutedResult extends SendTally {
  campaignId: string;
  status: 'executed';
  message: string;
}

export interface ScheduledResult {
  campaignId: string;
  status: 'scheduled';
  scheduledFor: Date;
  message: string;
}

export interface TestSendResult {
  campaignId: string;
  status: 'test_sent';
  sentCount: number;
  failedCount: number;
  recipients: string[];
  message: string;
}

export type ExecuteResult = ExecutedResult | ScheduledResult | TestSendResult;

export interface SendPendingResult extends SendTally {
  campaignId: string;
  status: 'sent' | 'no_pending';
  message: string;
}

export interface ResendResult {
  campaignId: string;
  memberId: string;
  status: 'resent' | 'failed';
  message: string;
}

export interface ExecuteOptions {
  sendTestEmail?: boolean;
  testEmailRecipients?: string[];
  scheduleFor?: Date;
}
