import type { Logger } from '../../logger.js';
import { bestEffort } from './attempt.js';

export const OVERLAY_PHRASES = ['accept', 'agree', 'got it', 'allow', 'ok', 'continue', 'close'] as const;
export const MAX_CLICKS_PER_PHRASE = 3;

export interface ClickTarget {
  readonly label: string;
  click(): Promise<void>;
}

export interface OverlaySurface {
  /** Clickable elements whose visible text contains `phrase`, ignoring case. */
  findClickTargets(phrase: string, limit: number): Promise<ClickTarget[]>;
}

export async function dismissOverlays(
  surface: OverlaySurface,
  logger: Logger,
  phrases: readonly string[] = OVERLAY_PHRASES
): Promise<void> {
  let clicked = 0;
  for (const phrase of phrases) {
    const targets = await bestEffort(
      `Locating "${phrase}" buttons`,
      () => surface.findClickTargets(phrase, MAX_CLICKS_PER_PHRASE),
      [],
      logger
    );
    for (const target of targets.slice(0, MAX_CLICKS_PER_PHRASE)) {
      const ok = await bestEffort(
        `Clicking "${target.label}"`,
        async () => {
          await target.click();
          return true;
        },
        false,
        logger
      );
      if (ok) {
        clicked += 1;
        logger.debug(`Dismissed overlay via "${target.label}"`);
      }
    }
  }
  if (clicked > 0) {
    logger.debug(`Clicked ${clicked} overlay button(s)`);
  }
}
