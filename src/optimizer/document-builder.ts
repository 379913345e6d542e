import { escape, uniq } from 'lodash';
import { ImageMetadata, SiteSettings } from './optimizer.interface';
import { slugify } from '../utils/text-analyzer';

export const PLACEHOLDER_DATE = '2025-01-01';

export interface DocumentParts {
  title: string;
  metaDescription: string;
  keyword: string;
  existingTags: string[];
  tags: string[];
  categories: string[];
  image: string;
  imageMetadata: ImageMetadata;
  schemaType: string;
  body: string;
}

export function canonicalUrl(site: SiteSettings, keyword: string): string {
  return `${site.siteUrl.replace(/\/+$/, '')}/${slugify(keyword)}`;
}

export function documentKeywords(parts: DocumentParts): string {
  return uniq([parts.keyword, ...parts.existingTags, ...parts.tags]).join(', ');
}

export function buildStructuredData(parts: DocumentParts, site: SiteSettings) {
  return {
    '@context': 'https://schema.org',
    '@type': parts.schemaType,
    headline: parts.title,
    description: parts.metaDescription,
    keywords: documentKeywords(parts),
    articleSection: parts.categories.join(', '),
    ...(parts.image ? { image: parts.image } : {}),
    author: { '@type': 'Person', name: site.authorName },
    publisher: {
      '@type': 'Organization',
      name: site.publisherName,
      logo: { '@type': 'ImageObject', url: site.publisherLogo },
    },
    datePublished: PLACEHOLDER_DATE,
    dateModified: PLACEHOLDER_DATE,
    mainEntityOfPage: { '@type': 'WebPage', '@id': canonicalUrl(site, parts.keyword) },
  };
}

function figure(image: string, meta: ImageMetadata): string {
  return [
    '<figure>',
    `<img src="${escape(image)}" alt="${escape(meta.altText)}" title="${escape(meta.imageTitle)}">`,
    `<figcaption>${escape(meta.imageCaption)}</figcaption>`,
    '</figure>',
  ].join('\n');
}

export function assembleDocument(parts: DocumentParts, site: SiteSettings): string {
  const jsonLd = JSON.stringify(buildStructuredData(parts, site), null, 2).replace(
    /</g,
    '\\u003c',
  );
  const keywords = documentKeywords(parts);

  return [
    '<!DOCTYPE html>',
    '<html lang="tr">',
    '<head>',
    '<meta charset="UTF-8">',
    '<meta name="viewport" content="width=device-width, initial-scale=1.0">',
    `<title>${escape(parts.title)}</title>`,
    `<meta name="description" content="${escape(parts.metaDescription)}">`,
    `<meta name="keywords" content="${escape(keywords)}">`,
    `<link rel="canonical" href="${escape(canonicalUrl(site, parts.keyword))}">`,
    '<script type="application/ld+json">',
    jsonLd,
    '</script>',
    '</head>',
    '<body>',
    '<article>',
    `<h1>${escape(parts.title)}</h1>`,
    ...(parts.image ? [figure(parts.image, parts.imageMetadata)] : []),
    parts.body,
    '</article>',
    '</body>',
    '</html>',
  ].join('\n');
}
