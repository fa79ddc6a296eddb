import type { FacilityProfile } from '../types';
import {
  CANADIAN_CARRIERS,
  DEFAULT_EXTRACTION,
  DEFAULT_NAVIGATION,
  UNIVERSAL_GATEWAY,
} from './common';

export const ubcProfile: FacilityProfile = {
  id: 'ubc',
  displayName: 'UBC Tennis Centre',
  shortName: 'UBC',
  envPrefix: 'UBC',
  loginUrl: 'https://portal.recreation.ubc.ca/index.php?r=public/index',
  bookingUrl: 'https://recreation.ubc.ca/tennis/court-booking/',
  bookingHost: 'ubc.ca',
  bookingEntrySelectors: ["a:has-text('Book a Court')", "a[href*='book']", '.book-court'],
  login: {
    usernameSelectors: [
      "input[name='CredentialForm[email]']",
      "input[id='inputEmail']",
      "input[name='LoginForm[email]']",
      "input[type='email']",
      "input[name='username']",
      "input[placeholder*='Email']",
    ],
    passwordSelectors: [
      "input[name='CredentialForm[password_curr]']",
      "input[id='inputPassword']",
      "input[type='password']",
    ],
    submitSelectors: [
      "input[type='submit'][value='Login']",
      "button[type='submit']",
      "input[type='submit']",
      '.login-button',
    ],
    successSelectors: [
      "a:has-text('Logout')",
      "a:has-text('Sign Out')",
      "*:has-text('Welcome')",
      "[class*='user-menu']",
    ],
  },
  extraction: {
    ...DEFAULT_EXTRACTION,
    candidateQuery: "button, a[onclick*='onChooseClick'], .book-button, .choose-button",
    // Facility cards offer "Choose" without a time; the card itself is the slot.
    candidateToken: /book|choose/i,
    requireTime: false,
    resourceLabelQuery: '.facility-details h2, .court-name, .court-number, h2',
  },
  navigation: DEFAULT_NAVIGATION,
  smsGateways: CANADIAN_CARRIERS,
  universalGateway: UNIVERSAL_GATEWAY,
  trackedDayOffsets: [0, 1, 2],
};
