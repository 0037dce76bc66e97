import { round2, formatUsd } from '../../src/common/money';

describe('round2', () => {
  it('should round to the nearest cent', () => {
    expect(round2(0.1 + 0.2)).toBe(0.3);
    expect(round2(3.333)).toBe(3.33);
    expect(round2(3.336)).toBe(3.34);
  });

  it('should send exact half-cent ties to the even cent', () => {
    expect(round2(0.125)).toBe(0.12);
    expect(round2(0.375)).toBe(0.38);
    expect(round2(0.625)).toBe(0.62);
    expect(round2(1.125)).toBe(1.12);
    expect(round2(-0.125)).toBe(-0.12);
  });

  it('should follow the stored binary value for amounts that only look like ties', () => {
    expect(round2(2.675)).toBe(2.67);
  });

  it('should leave whole cents alone', () => {
    expect(round2(11.25)).toBe(11.25);
    expect(round2(2.5)).toBe(2.5);
  });
});

describe('formatUsd', () => {
  it('should print two decimals', () => {
    expect(formatUsd(2.5)).toBe('$2.50');
  });
});
