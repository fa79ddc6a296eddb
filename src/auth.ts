import type { Logger } from 'pino';
import { findFirst } from './selectors';
import type { AppConfig, FacilityProfile, SessionGateway } from './types';

function isLoginUrl(url: string): boolean {
  return url.toLowerCase().includes('login') || url.includes('r=public/index');
}

export async function checkLoginSuccess(
  gateway: SessionGateway,
  profile: FacilityProfile,
  logger: Logger
): Promise<boolean> {
  const url = gateway.currentUrl();
  logger.debug({ url }, 'Checking login result');

  if (isLoginUrl(url)) {
    logger.warn({ url }, 'Still on login page');
    return false;
  }

  const indicator = await findFirst(gateway, profile.login.successSelectors, (element) =>
    element.isDisplayed()
  );
  if (indicator) {
    logger.debug({ selector: indicator.selector }, 'Found login success indicator');
    return true;
  }

  // Redirected somewhere else without an explicit marker.
  return url !== profile.loginUrl;
}

/**
 * Signs in with the configured credentials. Returns `false` on any failure so
 * the caller can continue anonymously; some calendars are public.
 */
export async function login(
  gateway: SessionGateway,
  profile: FacilityProfile,
  config: AppConfig,
  logger: Logger
): Promise<boolean> {
  const { username, password } = config.credentials;
  if (!username || !password) {
    logger.info({ facility: profile.id }, 'No credentials configured; browsing anonymously');
    return false;
  }

  try {
    logger.info({ facility: profile.id, url: profile.loginUrl }, 'Logging in');
    await gateway.navigate(profile.loginUrl);
    await gateway.pause(config.settleMs);

    const usernameField = await findFirst(gateway, profile.login.usernameSelectors);
    const passwordField = await findFirst(gateway, profile.login.passwordSelectors);
    if (!usernameField || !passwordField) {
      logger.warn('Login form fields not found');
      return false;
    }

    logger.debug(
      { username: usernameField.selector, password: passwordField.selector },
      'Found login fields'
    );
    await usernameField.element.fill(username);
    await passwordField.element.fill(password);

    const submit = await findFirst(gateway, profile.login.submitSelectors);
    if (!submit) {
      logger.warn('Login submit control not found');
      return false;
    }

    await submit.element.click();
    await gateway.pause(config.settleMs);

    const success = await checkLoginSuccess(gateway, profile, logger);
    if (success) {
      logger.info({ facility: profile.id }, 'Login successful');
    } else {
      logger.warn({ facility: profile.id }, 'Login failed');
    }
    return success;
  } catch (error) {
    logger.warn({ err: error, facility: profile.id }, 'Login error');
    return false;
  }
}
