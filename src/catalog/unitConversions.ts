import { chargeTimeMultiplier, type ChargeTimeUnit } from '../config/teslafiConfig';

export const METERS_PER_MILE = 1609.344;
export const KMH_PER_MPH = 1.609344;

export const UNIT_CONVERSIONS = [
  'milesToMeters',
  'milesPerHourToKilometersPerHour',
  'chargeTimeToSeconds',
] as const;

export type UnitConversion = (typeof UNIT_CONVERSIONS)[number];

export type UnitMultipliers = Record<UnitConversion, number>;

export const buildUnitMultipliers = (chargeTimeUnit: ChargeTimeUnit): UnitMultipliers => ({
  milesToMeters: METERS_PER_MILE,
  milesPerHourToKilometersPerHour: KMH_PER_MPH,
  chargeTimeToSeconds: chargeTimeMultiplier(chargeTimeUnit),
});
