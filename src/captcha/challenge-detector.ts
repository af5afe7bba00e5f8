import * as cheerio from 'cheerio';
import type { Logger } from 'pino';
import { getLogger } from '../shared/logger.js';
import { CHALLENGE_FRAME_MARKERS, CHALLENGE_TEXT_MARKER } from '../shared/constants.js';
import { errorMessage } from '../shared/errors.js';
import { normalizeWhitespace, truncate } from '../shared/utils.js';
import type { BrowserSession } from '../types/index.js';

export type ChallengeKind = 'frame' | 'text';

export interface ChallengeDetection {
  kind: ChallengeKind;
  /** The provider marker or text marker that matched. */
  marker: string;
  /** Frame URL or a short excerpt of the matching text. */
  detail: string;
}

/** Elements whose text never counts as visible page text. */
const NON_TEXT_ELEMENTS = 'script, style, noscript, template';

/**
 * Scans a page snapshot for a bot-verification challenge: an embedded
 * frame from a known provider, or the word "captcha" anywhere in the
 * page text (case-insensitive). Frames are checked first.
 */
export function scanForChallenge(html: string): ChallengeDetection | null {
  const $ = cheerio.load(html);

  for (const element of $('iframe[src]').toArray()) {
    const src = ($(element).attr('src') ?? '').toLowerCase();
    const marker = CHALLENGE_FRAME_MARKERS.find((m) => src.includes(m));
    if (marker) {
      return { kind: 'frame', marker, detail: src };
    }
  }

  $(NON_TEXT_ELEMENTS).remove();
  const text = normalizeWhitespace($.root().text());
  const at = text.toLowerCase().indexOf(CHALLENGE_TEXT_MARKER);
  if (at >= 0) {
    const excerpt = text.slice(Math.max(0, at - 30), at + CHALLENGE_TEXT_MARKER.length + 30);
    return { kind: 'text', marker: CHALLENGE_TEXT_MARKER, detail: truncate(excerpt, 80) };
  }

  return null;
}

/**
 * Checks the session's current page for a challenge.
 *
 * Fails open: when the page cannot be read the result is "no challenge"
 * and the run carries on. A challenge that appears while the page is
 * unreadable is therefore missed until the next pass.
 */
export class ChallengeDetector {
  private readonly session: BrowserSession;
  private readonly logger: Logger;

  constructor(session: BrowserSession, logger: Logger = getLogger('captcha', { component: 'challenge-detector' })) {
    this.session = session;
    this.logger = logger;
  }

  async detect(): Promise<ChallengeDetection | null> {
    let html: string;
    try {
      html = await this.session.content();
    } catch (error) {
      this.logger.warn({ error: errorMessage(error) }, 'Challenge check could not read the page, continuing');
      return null;
    }

    const detection = scanForChallenge(html);
    if (detection) {
      this.logger.debug({ kind: detection.kind, marker: detection.marker }, 'Challenge markers found');
    }
    return detection;
  }

  async detected(): Promise<boolean> {
    return (await this.detect()) !== null;
  }
}
