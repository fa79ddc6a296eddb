import type { Logger } from 'pino';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export type MailTransport = 'smtp' | 'resend';

export interface MailConfig {
  transport: MailTransport;
  smtpHost: string;
  smtpPort: number;
  senderEmail: string;
  senderPassword: string;
  resendApiKey: string;
}

export interface NotificationConfig {
  email: string;
  phoneNumber: string;
}

export interface Preferences {
  preferredTimes: string[];
  preferredCourts: string[];
}

export interface AppConfig {
  facilityId: string;
  bookingUrl: string;
  credentials: {
    username: string;
    password: string;
  };
  notification: NotificationConfig;
  mail: MailConfig;
  preferences: Preferences;
  headless: boolean;
  logLevel: LogLevel;
  logFile: string;
  outputDir: string;
  pageLoadTimeout: number;
  settleMs: number;
  monitoringIntervalMinutes: number;
  maxAttempts: number;
  errorBackoffSeconds: number;
}

export interface Position {
  x: number;
  y: number;
}

export interface PageElement {
  text(): Promise<string>;
  attribute(name: string): Promise<string | null>;
  click(): Promise<void>;
  fill(value: string): Promise<void>;
  isDisplayed(): Promise<boolean>;
  isEnabled(): Promise<boolean>;
  position(): Promise<Position | null>;
}

export interface SessionGateway {
  navigate(url: string): Promise<void>;
  currentUrl(): string;
  findAll(query: string): Promise<PageElement[]>;
  find(query: string): Promise<PageElement | null>;
  pause(ms: number): Promise<void>;
}

/** A live browser (or stand-in) whose gateway stays valid until `close`. */
export interface ManagedSession {
  gateway: SessionGateway;
  isAlive(): boolean;
  close(): Promise<void>;
}

export interface SessionProvider {
  acquire(): Promise<SessionGateway>;
  release(): Promise<void>;
}

export interface SlotRecord {
  resourceName: string;
  timeLabel: string | null;
  durationLabel: string;
  priceLabel: string;
  date: string;
  rawText: string;
  interactable: boolean;
}

export type DateSlotMap = Record<string, SlotRecord[]>;

export interface MonitorState {
  observed: Set<string>;
  sentBatches: Set<string>;
}

export interface ExtractionRules {
  candidateQuery: string;
  /** Text a clickable element must carry to count as a booking control. */
  candidateToken: RegExp;
  /** When false, a control without a parsable time is still a slot. */
  requireTime: boolean;
  resourceLabelQuery: string;
  falsePositives: string[];
  timePatterns: RegExp[];
  resourcePatterns: RegExp[];
}

export interface NavigationRules {
  dateControlQuery: string;
  nextDaySelectors: string[];
  dateInputSelectors: string[];
}

export interface LoginRules {
  usernameSelectors: string[];
  passwordSelectors: string[];
  submitSelectors: string[];
  successSelectors: string[];
}

export interface CarrierGateway {
  carrier: string;
  domain: string;
}

export interface FacilityProfile {
  id: string;
  displayName: string;
  shortName: string;
  envPrefix: string;
  loginUrl: string;
  bookingUrl: string;
  bookingHost: string;
  bookingEntrySelectors: string[];
  login: LoginRules;
  extraction: ExtractionRules;
  navigation: NavigationRules;
  smsGateways: CarrierGateway[];
  universalGateway: CarrierGateway;
  trackedDayOffsets: number[];
}

export interface MonitorContext {
  config: AppConfig;
  profile: FacilityProfile;
  logger: Logger;
  gateway: SessionGateway;
  state: MonitorState;
}

export type MonitorEnvironment = Omit<MonitorContext, 'gateway'> & {
  sessions: SessionProvider;
};
