import {
  AdjustLeadScoreInput,
  BulkCreateProspectsInput,
  ConvertProspectInput,
  CreateProspectInput,
  QueryProspectsInput,
  UpdateProspectInput,
} from '../schema/prospect.schema';

export type CreateProspectDto = CreateProspectInput;
export type BulkCreateProspectsDto = BulkCreateProspectsInput;
export type UpdateProspectDto = UpdateProspectInput;
export type AdjustLeadScoreDto = AdjustLeadScoreInput;
export type ConvertProspectDto = ConvertProspectInput;
export type QueryProspectsDto = QueryProspectsInput;
