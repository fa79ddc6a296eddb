import type { FacilityProfile } from '../types';
import { btcProfile } from './btc.profile';
import { ubcProfile } from './ubc.profile';

export const facilities: FacilityProfile[] = [btcProfile, ubcProfile];

export function getFacility(id: string): FacilityProfile | undefined {
  const wanted = id.trim().toLowerCase();
  return facilities.find((facility) => facility.id === wanted);
}

export function listFacilities(): FacilityProfile[] {
  return [...facilities];
}
