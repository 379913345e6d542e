import * as cheerio from 'cheerio';
import { ScoreCheck, ScoreReport } from './optimizer.interface';
import { analyzeText } from '../utils/text-analyzer';
import { MIN_BODY_WORDS, TOC_CLASS } from './content-rewriter';

export const MAX_SCORE = 100;
export const KEYWORD_MIN_OCCURRENCES = 3;

export const SCORE_WEIGHTS = {
  titleTag: 10,
  metaDescription: 10,
  h1: 5,
  h2: { each: 2, cap: 10 },
  h3: { each: 2, cap: 6 },
  keywordUsage: 15,
  internalLinks: { each: 2, cap: 6 },
  externalLinks: { each: 2, cap: 4 },
  imageAlt: { each: 2, cap: 6 },
  contentLength: 10,
  tableOfContents: 5,
  schemaMarkup: 5,
} as const;

function capped(count: number, weight: { each: number; cap: number }): number {
  return Math.min(count * weight.each, weight.cap);
}

function isInternal(href: string, siteUrl: string): boolean {
  return (href.startsWith('/') && !href.startsWith('//')) || href.startsWith(siteUrl);
}

/**
 * Scores a document against the checklist in {@link SCORE_WEIGHTS}, starting
 * from `baseScore`. Body metrics come from `bodyHtml` when given, otherwise
 * from the whole document.
 */
export function scoreDocument(
  documentHtml: string,
  keyword: string,
  baseScore: number,
  options: { siteUrl: string; bodyHtml?: string },
): ScoreReport {
  const $ = cheerio.load(documentHtml);
  const body = analyzeText(options.bodyHtml ?? documentHtml, keyword);

  const hrefs = $('a[href]')
    .map((_, el) => $(el).attr('href') ?? '')
    .get()
    .filter((href) => href && !href.startsWith('#'));
  const internal = hrefs.filter((href) => isInternal(href, options.siteUrl)).length;
  const external = hrefs.filter(
    (href) => /^https?:\/\//i.test(href) && !href.startsWith(options.siteUrl),
  ).length;
  const imagesWithAlt = $('img').filter((_, el) => ($(el).attr('alt') ?? '').trim() !== '').length;

  const w = SCORE_WEIGHTS;
  const candidates: ScoreCheck[] = [
    { check: 'title_tag', points: $('title').text().trim() ? w.titleTag : 0 },
    {
      check: 'meta_description',
      points: ($('meta[name="description"]').attr('content') ?? '').trim() ? w.metaDescription : 0,
    },
    { check: 'h1', points: $('h1').length > 0 ? w.h1 : 0 },
    { check: 'h2', points: capped($('h2').length, w.h2) },
    { check: 'h3', points: capped($('h3').length, w.h3) },
    {
      check: 'keyword_usage',
      points: body.keywordCount >= KEYWORD_MIN_OCCURRENCES ? w.keywordUsage : 0,
    },
    { check: 'internal_links', points: capped(internal, w.internalLinks) },
    { check: 'external_links', points: capped(external, w.externalLinks) },
    { check: 'image_alt', points: capped(imagesWithAlt, w.imageAlt) },
    { check: 'content_length', points: body.wordCount >= MIN_BODY_WORDS ? w.contentLength : 0 },
    { check: 'table_of_contents', points: $(`.${TOC_CLASS}`).length > 0 ? w.tableOfContents : 0 },
    {
      check: 'schema_markup',
      points: $('script[type="application/ld+json"]').length > 0 ? w.schemaMarkup : 0,
    },
  ];
  const checks = candidates.filter((c) => c.points > 0);
  const gained = checks.reduce((sum, c) => sum + c.points, 0);

  return {
    score: Math.min(baseScore + gained, MAX_SCORE),
    checks,
    wordCount: body.wordCount,
    keywordCount: body.keywordCount,
    keywordDensity: body.keywordDensity,
  };
}

export function fallbackScore(currentScore: number): number {
  return Math.max(currentScore, Math.min(currentScore + 25, 95));
}
