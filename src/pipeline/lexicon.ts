// Home chargepoint brands sold in the UK/EU, including common misspellings.
// Order matters: a term must come before any shorter term it contains.
export const chargerBrands = [
  'Hypervolt',
  'Hypervault',
  'Ohme',
  'Zappi',
  'Project EV',
  'Pod Point',
  'Wallbox',
  'Easee',
  'Rolec',
  'EO Charging',
  'Andersen',
  'Anderson',
  'SyncEV',
  'Alfen',
  'EVBox',
  'ChargePoint',
  'Tesla',
  'ABB',
  'Garo',
  'NewMotion',
  'Shell Recharge',
  'Connected Kerb',
  'Hive',
  'EVEC',
  'Simpson & Partners',
  'Simpson',
  'PodPoint',
  'myenergi',
  'myenergy',
  'NexBlue',
  'GivEnergy',
  'Indra',
] as const;

export const tariffs = [
  'Agile Octopus',
  'Intelligent Octopus',
  'Octopus Go',
  'OVO Charge Anytime',
  'Octopus',
  'OVO',
  'British Gas',
  'IOG',
  'Agile',
] as const;

export type ChargerBrand = typeof chargerBrands[number];
export type Tariff = typeof tariffs[number];

export const UNKNOWN_BRAND = 'Unknown';
export const NO_TARIFF = 'None';
