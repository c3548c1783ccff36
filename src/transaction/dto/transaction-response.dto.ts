// Purchase as returned by the API
export interface TransactionDto {
  id: string;
  asset: string;
  kind: string;
  unitAmount: number;
  unitPrice: number;
  fee: number;
  totalCost: number;               // unitAmount × unitPrice + fee
  occurredAt: string;
  notes?: string;
  recordedAt: string;
}

export interface BalanceResponseDto {
  totalContributed: number;
  totalSpent: number;
  availableBalance: number;        // may be negative, never clamped
}
