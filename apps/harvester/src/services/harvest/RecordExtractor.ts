import * as cheerio from 'cheerio';
import type { GameRecord } from '@mustplay/shared-types';
import {
  cleanText,
  parseCatalogDate,
  parseMetascore,
  resolveCatalogUrl,
} from '../../utils/coerce';

export const CARD_SELECTOR = 'a.c-finderProductCard_container';
export const MUST_PLAY_SELECTOR = 'img[alt="must-play"]';

const RANK_SELECTOR = '.c-finderProductCard_titleHeading span:nth-of-type(1)';
const TITLE_SELECTOR = '.c-finderProductCard_titleHeading span:nth-of-type(2)';
const DATE_SELECTOR = '.c-finderProductCard_meta span:nth-of-type(1)';
const SCORE_SELECTOR = '.c-siteReviewScore span';

export interface ExtractedCard {
  index: number; // 1-based, counted over every card on the page
  record: GameRecord;
}

export interface PageExtraction {
  cardCount: number;
  cards: ExtractedCard[];
}

/**
 * Pulls the must-play cards out of one listing page.
 * Cards without the badge are skipped; a missing sub-element only blanks
 * its own field.
 */
export function extractGames(html: string, origin: string): PageExtraction {
  const $ = cheerio.load(html);
  const cards = $(CARD_SELECTOR);
  const extracted: ExtractedCard[] = [];

  cards.each((i, element) => {
    const $card = $(element);
    if ($card.find(MUST_PLAY_SELECTOR).length === 0) return;

    const textOf = (selector: string): string | undefined => {
      const match = $card.find(selector).first();
      return match.length > 0 ? cleanText(match.text()) : undefined;
    };

    const record: GameRecord = {
      rank: textOf(RANK_SELECTOR),
      title: textOf(TITLE_SELECTOR),
      releaseDate: parseCatalogDate(textOf(DATE_SELECTOR)),
      metascore: parseMetascore(textOf(SCORE_SELECTOR)),
      url: resolveCatalogUrl($card.attr('href'), origin),
    };

    extracted.push({ index: i + 1, record: Object.freeze(record) });
  });

  return { cardCount: cards.length, cards: extracted };
}
