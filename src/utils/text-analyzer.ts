import * as cheerio from 'cheerio';
import { escapeRegExp } from 'lodash';

const TRANSLITERATIONS: Record<string, string> = {
  ç: 'c',
  ğ: 'g',
  ı: 'i',
  ö: 'o',
  ş: 's',
  ü: 'u',
  Ç: 'C',
  Ğ: 'G',
  İ: 'I',
  Ö: 'O',
  Ş: 'S',
  Ü: 'U',
};

export function decodeEntities(text: string): string {
  return cheerio.load(text.replace(/</g, '&lt;'), null, false).root().text();
}

/**
 * Flattens markup to plain text: script/style blocks dropped, tags replaced
 * by a space, entities decoded, whitespace collapsed.
 */
export function stripTags(html: string): string {
  const text = html
    .replace(/<(script|style)\b[^>]*>[\s\S]*?<\/\1>/gi, ' ')
    .replace(/<[^>]+>/g, ' ');
  return decodeEntities(text).replace(/\s+/g, ' ').trim();
}

export function countWords(text: string): number {
  return text.split(/\s+/).filter((word) => word.length > 0).length;
}

// Turkish casing, with dotted and dotless i treated as the same letter.
export function foldCase(text: string): string {
  return text.toLocaleLowerCase('tr').replace(/ı/g, 'i');
}

export function countOccurrences(text: string, keyword: string): number {
  if (!keyword) return 0;
  const pattern = new RegExp(escapeRegExp(foldCase(keyword)), 'g');
  return (foldCase(text).match(pattern) || []).length;
}

export function containsKeyword(text: string, keyword: string): boolean {
  return foldCase(text).includes(foldCase(keyword));
}

export function transliterate(text: string): string {
  return text.replace(/[çğıöşüÇĞİÖŞÜ]/g, (char) => TRANSLITERATIONS[char] ?? char);
}

export function slugify(text: string): string {
  return transliterate(text)
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
}

export function analyzeText(html: string, keyword: string) {
  const text = stripTags(html);
  const wordCount = countWords(text);
  const keywordCount = countOccurrences(text, keyword);
  const keywordDensity =
    wordCount > 0 ? Math.round((keywordCount / wordCount) * 10000) / 100 : 0;

  return { text, wordCount, keywordCount, keywordDensity };
}
