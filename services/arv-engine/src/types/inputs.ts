// TypeScript types matching contracts/arv_engine_v0.schema.json

import type { ComparableSaleInput, PropertyInput } from "./property.js";

export type { ComparableSaleInput, PropertyInput } from "./property.js";

export interface ArvEngineInputs {
  contract: ContractInput;
  analysis: AnalysisInput;
  subject: PropertyInput;
  comparables: ComparableSaleInput[];
  renovation?: RenovationInput;
}

export interface ContractInput {
  contract_version: "ARV_ENGINE_V0";
  engine_version: string;
}

export interface AnalysisInput {
  as_of_date: string;
  purchase_price: number;
  // Raise InsufficientCompsError instead of degrading to LOW confidence
  strict?: boolean;
}

export interface LineItemInput {
  item: string;
  grade: string;
  quantity?: number;
}

export interface RenovationInput {
  contingency_rate?: number;
  permitting_cost?: number;
  holding_cost?: number;
  line_items?: LineItemInput[];
}
