import type { PageElement, SessionGateway } from './types';

/**
 * Evaluates `attempt` over `items` in order and returns the first non-null
 * result. A throwing attempt counts as "no match" and the walk continues.
 */
export async function firstMatch<T, R>(
  items: readonly T[],
  attempt: (item: T, index: number) => Promise<R | null>
): Promise<{ item: T; result: R } | null> {
  for (let i = 0; i < items.length; i += 1) {
    const item = items[i];
    const result = await attempt(item, i).catch(() => null);
    if (result !== null) {
      return { item, result };
    }
  }
  return null;
}

export async function isUsable(element: PageElement): Promise<boolean> {
  return (await element.isDisplayed()) && (await element.isEnabled());
}

export async function findFirst(
  gateway: SessionGateway,
  selectors: readonly string[],
  predicate?: (element: PageElement) => Promise<boolean>
): Promise<{ selector: string; element: PageElement } | null> {
  const match = await firstMatch(selectors, async (selector) => {
    const element = await gateway.find(selector);
    if (!element) {
      return null;
    }
    if (predicate && !(await predicate(element))) {
      return null;
    }
    return element;
  });

  return match ? { selector: match.item, element: match.result } : null;
}
