// Contribution as returned by the API
export interface ContributionDto {
  id: string;
  memberId: string;
  amount: number;
  occurredAt: string;              // ISO timestamp
  recordedAt: string;
}

// member -> ownership percentage (0..100)
export interface OwnershipResponseDto {
  totalPool: number;
  members: Array<{
    memberId: string;
    contributed: number;
    ownershipPct: number;
  }>;
}
