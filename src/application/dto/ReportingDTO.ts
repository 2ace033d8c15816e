export interface MonthlyKpiDTO {
  purchaseMonth: string;
  totalSpend: number;
  activeVendors: number;
  highRiskOrders: number;
  avgDeliveryDays: number | null;
}

export interface PipelineCountsDTO {
  totalRows: number;
  cleanRows: number;
  rejectedRows: number;
  factRows: number;
}
