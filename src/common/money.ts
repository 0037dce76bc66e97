/**
 * Round a currency amount to cents.
 *
 * An amount exactly halfway between two cents (an odd multiple of 1/8, the
 * only such values a double can hold) goes to the even cent; everything
 * else rounds to the nearest cent.
 */
export function round2(amount: number): number {
  const scaled = amount * 100;
  const eighths = amount * 8;
  if (Number.isInteger(eighths) && eighths % 2 !== 0) {
    const floor = Math.floor(scaled);
    return (floor % 2 === 0 ? floor : floor + 1) / 100;
  }
  return Math.round(scaled) / 100;
}

export function formatUsd(amount: number): string {
  return `$${amount.toFixed(2)}`;
}
