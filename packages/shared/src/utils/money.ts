const amountFormat = new Intl.NumberFormat('en-US', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

// 1234.5 -> "1,234.50"
export function formatAmount(amount: number): string {
  return amountFormat.format(amount);
}

// Sums in cents so that 0.1 + 0.2 style drift never reaches a report.
export function addAmounts(a: number, b: number): number {
  return Math.round((a + b) * 100) / 100;
}
