const moneyFormat = new Intl.NumberFormat("en-US", { maximumFractionDigits: 0 });

/**
 * Rounds half away from zero at `digits` decimals. The scaled value is first
 * trimmed to 12 significant digits so binary noise such as
 * 1644.4999999999998 still rounds as 1644.5.
 */
export function roundTo(value: number, digits: number): number {
  const factor = 10 ** digits;
  const scaled = Number((value * factor).toPrecision(12));
  const rounded = Math.sign(scaled) * Math.round(Math.abs(scaled));
  return rounded / factor + 0;
}

export function formatMoney(value: number): string {
  return moneyFormat.format(value);
}
