// allowedReadSize returns how many of the requested bytes may be pulled next without the total
// exceeding limit. 0 means the budget is exhausted.
export function allowedReadSize(totalRead: number, limit: number | undefined, requested: number): number {
  if (limit === undefined) return requested;
  return Math.min(requested, Math.max(0, limit - totalRead));
}

// exceedsReadBudget reports whether pulling needed more bytes would overrun limit.
export function exceedsReadBudget(totalRead: number, limit: number | undefined, needed: number): boolean {
  if (limit === undefined) return false;
  return totalRead > limit || needed > limit - totalRead;
}
