/** 12 V LiFePO4 resting voltage to state of charge. Points are sorted by voltage. */
export const LIFEPO4_12V_CURVE: ReadonlyArray<readonly [volts: number, percent: number]> = [
  [10.0, 0],
  [11.0, 5],
  [12.0, 10],
  [12.4, 15],
  [12.8, 20],
  [12.85, 25],
  [12.9, 30],
  [12.95, 35],
  [13.0, 40],
  [13.05, 55],
  [13.1, 60],
  [13.15, 65],
  [13.2, 70],
  [13.25, 75],
  [13.3, 80],
  [13.35, 85],
  [13.4, 90],
  [13.5, 95],
  [13.6, 100],
];

/** Shunt the sensor firmware assumes, in milliohms. */
export const DEFAULT_SHUNT_MILLIOHMS = 100;

/** Linear interpolation over the curve, clamped at both ends and rounded to a whole percent. */
export function voltageToPercent(
  volts: number,
  curve: ReadonlyArray<readonly [number, number]> = LIFEPO4_12V_CURVE,
): number {
  const [firstVolts, firstPercent] = curve[0];
  const [lastVolts, lastPercent] = curve[curve.length - 1];
  if (volts <= firstVolts) {
    return firstPercent;
  }
  if (volts >= lastVolts) {
    return lastPercent;
  }
  for (let index = 0; index < curve.length - 1; index += 1) {
    const [v1, p1] = curve[index];
    const [v2, p2] = curve[index + 1];
    if (volts >= v1 && volts <= v2) {
      return Math.round(p1 + ((volts - v1) / (v2 - v1)) * (p2 - p1));
    }
  }
  return 0;
}

/**
 * Factor that corrects a current reading taken through a different shunt than the firmware
 * assumes. Returns 1 when the sensor description cannot produce a shunt value.
 */
export function currentScaleFactor(fullScaleMv: number, fullScaleA: number): number {
  if (fullScaleA === 0) {
    return 1;
  }
  const shuntMilliohms = fullScaleMv / fullScaleA;
  return shuntMilliohms === 0 ? 1 : DEFAULT_SHUNT_MILLIOHMS / shuntMilliohms;
}
