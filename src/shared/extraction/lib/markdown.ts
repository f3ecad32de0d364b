import * as cheerio from 'cheerio';
import type { CheerioAPI } from 'cheerio';
import TurndownService from 'turndown';

const NOISE_TAGS = 'script, style, nav, footer, header, aside, iframe, noscript';
const NOISE_CLASS =
  /(^|[-_])(ad|ads|advert|advertisement|banner|cookie|cookies|popup|subscription|login-modal)([-_]|$)/i;
const FORM_TAGS = 'button, input, form, select, textarea';

export interface CleanOptions {
  includeLinks?: boolean;
  includeImages?: boolean;
}

/** Drops page chrome (navigation, scripts, ad and cookie containers). */
export function stripNoise($: CheerioAPI): void {
  $(NOISE_TAGS).remove();
  $('[class]').each((_, element) => {
    const classes = ($(element).attr('class') ?? '').split(/\s+/);
    if (classes.some((name) => NOISE_CLASS.test(name))) {
      $(element).remove();
    }
  });
}

let turndown: TurndownService | null = null;

function converter(): TurndownService {
  if (!turndown) {
    turndown = new TurndownService({
      headingStyle: 'atx',
      codeBlockStyle: 'fenced',
      bulletListMarker: '-',
    });
  }
  return turndown;
}

export function htmlToMarkdown(html: string, options: CleanOptions = {}): string {
  const $ = cheerio.load(html);
  stripNoise($);
  $(FORM_TAGS).remove();

  if (!options.includeLinks) {
    $('a').each((_, element) => {
      $(element).replaceWith($(element).contents());
    });
  }
  if (!options.includeImages) {
    $('img').remove();
  }

  const body = $('body').html() ?? '';
  return converter()
    .turndown(body)
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

export function htmlToText(html: string): string {
  const $ = cheerio.load(html);
  stripNoise($);
  // Separate adjacent elements so their words do not run together.
  $('body').find('*').after(' ');
  return $('body').text().replace(/\s+/g, ' ').trim();
}
