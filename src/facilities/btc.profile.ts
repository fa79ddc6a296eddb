import type { FacilityProfile } from '../types';
import {
  CANADIAN_CARRIERS,
  DEFAULT_EXTRACTION,
  DEFAULT_NAVIGATION,
  UNIVERSAL_GATEWAY,
} from './common';

export const btcProfile: FacilityProfile = {
  id: 'btc',
  displayName: 'Burnaby Tennis Club',
  shortName: 'BTC',
  envPrefix: 'BTC',
  loginUrl: 'https://www.burnabytennis.ca/login',
  bookingUrl: 'https://www.burnabytennis.ca/app/bookings/grid',
  bookingHost: 'burnabytennis.ca',
  bookingEntrySelectors: [],
  login: {
    usernameSelectors: [
      "input[type='email']",
      "input[name='email']",
      "input[name='username']",
      "input[name='user']",
      "input[id*='email']",
      "input[id*='username']",
    ],
    passwordSelectors: ["input[type='password']", "input[name='password']"],
    submitSelectors: [
      "button[type='submit']",
      "input[type='submit']",
      "button:has-text('Log in')",
      "button:has-text('Sign in')",
    ],
    successSelectors: [
      "a:has-text('Logout')",
      "a:has-text('Sign Out')",
      "button:has-text('Logout')",
      "[class*='user-menu']",
      "[class*='profile']",
    ],
  },
  extraction: {
    ...DEFAULT_EXTRACTION,
    candidateQuery: 'button',
  },
  navigation: DEFAULT_NAVIGATION,
  smsGateways: CANADIAN_CARRIERS,
  universalGateway: UNIVERSAL_GATEWAY,
  trackedDayOffsets: [0, 1, 2],
};
