import { take } from 'lodash';
import { ImageMetadata, RandomInt } from './optimizer.interface';
import { containsKeyword, slugify, stripTags } from '../utils/text-analyzer';

export const TITLE_MAX_LENGTH = 60;
export const META_MAX_LENGTH = 160;
export const META_MIN_LENGTH = 150;
export const MIN_SUGGESTED_TAGS = 5;
export const MAX_SUGGESTED_TAGS = 10;

const ELLIPSIS = '...';

function clamp(text: string, max: number): string {
  return text.length > max ? text.slice(0, max - ELLIPSIS.length) + ELLIPSIS : text;
}

export function metaTemplate(keyword: string): string {
  return `${keyword} hakkında bilmeniz gereken her şeyi bu kapsamlı rehberde bulabilirsiniz.`;
}

export function metaPadding(keyword: string): string {
  return ` Uzman önerileri, pratik ipuçları ve güncel bilgilerle ${keyword} konusunda doğru kararlar verin.`;
}

export function buildTitle(title: string, keyword: string): string {
  const base = containsKeyword(title, keyword)
    ? title
    : `${keyword} - ${title}`;
  return clamp(base, TITLE_MAX_LENGTH);
}

export function buildMetaDescription(html: string, keyword: string): string {
  const seed = stripTags(html)
    .split('.')
    .map((segment) => segment.trim())
    .find((segment) => segment.length > 0);

  let description = seed ? `${seed}. ${metaTemplate(keyword)}` : metaTemplate(keyword);
  if (description.length < META_MIN_LENGTH) {
    description += metaPadding(keyword);
  }
  return clamp(description, META_MAX_LENGTH);
}

export function tagCandidates(keyword: string): string[] {
  return [
    keyword,
    `${keyword} rehberi`,
    `${keyword} nedir`,
    `${keyword} nasıl yapılır`,
    `${keyword} 2025`,
    `${keyword} ipuçları`,
    `${keyword} avantajları`,
    `${keyword} örnekleri`,
    `en iyi ${keyword}`,
    `${keyword} hakkında`,
  ];
}

/**
 * Head of {@link tagCandidates}. Without a fixed count the length is drawn
 * from `randomInt`, so two calls may return different lists.
 */
export function suggestTags(
  keyword: string,
  randomInt: RandomInt,
  fixedCount?: number,
): string[] {
  const count = fixedCount ?? randomInt(MIN_SUGGESTED_TAGS, MAX_SUGGESTED_TAGS);
  return take(tagCandidates(keyword), count);
}

export function buildImageMetadata(keyword: string): ImageMetadata {
  return {
    altText: `${keyword} rehberi görseli`,
    imageTitle: `${slugify(keyword)}-rehberi`,
    imageCaption: `${keyword} hakkında bilmeniz gerekenler`,
    imageDescription:
      `Bu görsel ${keyword} konusunu özetlemektedir. ` +
      `${keyword} ile ilgili temel bilgileri, avantajları ve uygulama adımlarını ` +
      `görsel olarak sunarak okuyucuların konuyu daha kolay anlamasına yardımcı olur.`,
  };
}

export const fallbacks = {
  title: (title: string, keyword: string) =>
    `${keyword} - ${title}`.slice(0, TITLE_MAX_LENGTH),
  metaDescription: (keyword: string) => metaTemplate(keyword).slice(0, META_MAX_LENGTH),
  tags: (keyword: string) => tagCandidates(keyword).slice(0, MIN_SUGGESTED_TAGS),
  imageMetadata: (keyword: string): ImageMetadata => ({
    altText: keyword,
    imageTitle: keyword,
    imageCaption: keyword,
    imageDescription: keyword,
  }),
};
