import type { CarrierGateway, ExtractionRules, NavigationRules } from '../types';

export const FALSE_POSITIVES = [
  'Booking Grid',
  'None',
  'N/A',
  'disabled',
  'unavailable',
  'closed',
  'maintenance',
];

// Most specific first.
export const TIME_PATTERNS: RegExp[] = [
  /Book\s+(\d{1,2}:\d{2}\s*(?:am|pm|AM|PM))/,
  /Book\s+(\d{1,2}:\d{2})/,
  /(\d{1,2}:\d{2}\s*(?:am|pm|AM|PM))/,
  /(\d{1,2}:\d{2})/,
];

export const RESOURCE_PATTERNS: RegExp[] = [
  /Court\s*(\d+)/i,
  /Court\s*([A-Z]\d+)/i,
  /(\d+)\s*Court/i,
];

export const DEFAULT_EXTRACTION: ExtractionRules = {
  candidateQuery: 'button, a[role="button"], [role="button"]',
  candidateToken: /book/i,
  requireTime: true,
  resourceLabelQuery: 'th, [role="columnheader"], h2, h3, .court-name, .court-number',
  falsePositives: FALSE_POSITIVES,
  timePatterns: TIME_PATTERNS,
  resourcePatterns: RESOURCE_PATTERNS,
};

export const DEFAULT_NAVIGATION: NavigationRules = {
  dateControlQuery: 'button, a, div, span',
  nextDaySelectors: [
    "button[class*='next']",
    "button[class*='arrow']",
    "button[class*='forward']",
    "div[class*='next']",
    "a[class*='next']",
    "button[title*='next' i]",
    "button[aria-label*='next' i]",
  ],
  dateInputSelectors: ["input[type='date']", "input[class*='date']"],
};

export const CANADIAN_CARRIERS: CarrierGateway[] = [
  { carrier: 'rogers', domain: 'pcs.rogers.com' },
  { carrier: 'bell', domain: 'txt.bell.ca' },
  { carrier: 'telus', domain: 'msg.telus.com' },
  { carrier: 'fido', domain: 'fido.ca' },
  { carrier: 'virgin', domain: 'vmobile.ca' },
  { carrier: 'koodo', domain: 'msg.koodomobile.com' },
];

export const UNIVERSAL_GATEWAY: CarrierGateway = { carrier: 'universal', domain: 'txt.att.net' };
