export type RiskLevel = 'low' | 'medium' | 'high' | 'critical';

export type PurchaseStrategy = 'cash' | 'installment' | 'installment_caution' | 'not_recommended';

export interface Recommendation {
  strategy: PurchaseStrategy;
  title: string;
  message: string;
  riskLevel: RiskLevel;
  store: string;
}
