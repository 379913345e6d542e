import { escape } from 'lodash';
import {
  containsKeyword,
  countWords,
  slugify,
  stripTags,
} from '../utils/text-analyzer';

export const MIN_BODY_WORDS = 600;
export const TRANSITION_WORDS = ['Ayrıca,', 'Bunun yanı sıra,'];
export const TOC_CLASS = 'table-of-contents';

const PARAGRAPH_OPEN = /<p(\s[^>]*)?>/i;
const PARAGRAPH_CLOSE = /<\/p>/i;
const H2_BLOCK = /<h2(\s[^>]*)?>([\s\S]*?)<\/h2>/gi;

// Every step works on the raw string and touches the first match only, so
// later steps see the output of earlier ones.

export function injectKeyword(html: string, keyword: string): string {
  if (containsKeyword(stripTags(html), keyword)) return html;

  const kw = escape(keyword);
  if (!PARAGRAPH_OPEN.test(html)) {
    return `<p>${kw} konusunda bilmeniz gerekenler.</p>\n${html}`;
  }
  return html.replace(PARAGRAPH_OPEN, (open) => `${open}${kw} konusunda `);
}

function h2WithKeyword(html: string, keyword: string): RegExpExecArray | null {
  H2_BLOCK.lastIndex = 0;
  let match: RegExpExecArray | null;
  while ((match = H2_BLOCK.exec(html)) !== null) {
    if (containsKeyword(stripTags(match[2]), keyword)) return match;
  }
  return null;
}

export function insertMainHeading(html: string, keyword: string): string {
  if (h2WithKeyword(html, keyword)) return html;
  return html.replace(
    PARAGRAPH_CLOSE,
    (close) => `${close}\n<h2>${escape(keyword)} Nedir?</h2>`,
  );
}

export function insertSubHeading(html: string, keyword: string): string {
  const heading = h2WithKeyword(html, keyword);
  if (!heading) return html;

  const end = heading.index + heading[0].length;
  const sub = `\n<h3 id="avantajlar">${escape(keyword)} Avantajları</h3>`;
  return html.slice(0, end) + sub + html.slice(end);
}

export function tableOfContents(keyword: string): string {
  const kw = escape(keyword);
  return [
    `<div class="${TOC_CLASS}">`,
    '<strong>İçindekiler</strong>',
    '<ul>',
    `<li><a href="#nedir">${kw} Nedir?</a></li>`,
    `<li><a href="#avantajlar">${kw} Avantajları</a></li>`,
    `<li><a href="#surec">${kw} Süreci</a></li>`,
    '<li><a href="#sonuc">Sonuç</a></li>',
    '</ul>',
    '</div>',
  ].join('\n');
}

export function insertTableOfContents(html: string, keyword: string): string {
  return html.replace(PARAGRAPH_CLOSE, (close) => `${close}\n${tableOfContents(keyword)}`);
}

export function linkTemplates(keyword: string): string[] {
  const kw = escape(keyword);
  const slug = slugify(keyword);
  return [
    `<a href="/${slug}">${kw} hakkında daha fazla bilgi</a>`,
    `<a href="/blog/${slug}">${kw} rehberimiz</a>`,
    `<a href="https://www.google.com/search?q=${encodeURIComponent(keyword)}" target="_blank" rel="nofollow">${kw} araştırmaları</a>`,
  ];
}

export function injectLinks(html: string, keyword: string): string {
  return linkTemplates(keyword).reduce(
    (current, link) => current.replace(PARAGRAPH_CLOSE, (close) => ` ${link}${close}`),
    html,
  );
}

export function addTransitions(html: string): string {
  let seen = 0;
  return html.replace(new RegExp(PARAGRAPH_OPEN.source, 'gi'), (open) => {
    seen += 1;
    const word = TRANSITION_WORDS[seen - 2];
    return word ? `${open}${word} ` : open;
  });
}

export function cannedSections(keyword: string): string {
  const kw = escape(keyword);
  return [
    `<h2 id="surec">${kw} Süreci Nasıl İşler?</h2>`,
    `<p>${kw} sürecini doğru planlamak, başarılı sonuçlar elde etmenin ilk adımıdır. ` +
      `Her aşamayı dikkatle takip ederek ${kw} ile ilgili hedeflerinize daha hızlı ulaşabilirsiniz.</p>`,
    `<h2>${kw} Kullanmanın Faydaları</h2>`,
    `<p>${kw} zaman kazandırır, maliyetleri düşürür ve daha öngörülebilir sonuçlar sağlar. ` +
      `Doğru bilgiyle hareket edenler ${kw} sayesinde rakiplerinin önüne geçer.</p>`,
    `<h2 id="sonuc">Sonuç</h2>`,
    `<p>Özetle, ${kw} konusunda bilinçli adımlar atmak uzun vadede fark yaratır. ` +
      `Bu rehberdeki önerileri uygulayarak ${kw} ile ilgili sürecinizi kolaylaştırabilirsiniz.</p>`,
  ].join('\n');
}

export function expandShortContent(html: string, keyword: string): string {
  if (countWords(stripTags(html)) >= MIN_BODY_WORDS) return html;
  return `${html}\n${cannedSections(keyword)}`;
}

export function rewriteBody(html: string, keyword: string): string {
  const steps: Array<(body: string) => string> = [
    (body) => injectKeyword(body, keyword),
    (body) => insertMainHeading(body, keyword),
    (body) => insertSubHeading(body, keyword),
    (body) => insertTableOfContents(body, keyword),
    (body) => injectLinks(body, keyword),
    addTransitions,
    (body) => expandShortContent(body, keyword),
  ];
  return steps.reduce((body, step) => step(body), html);
}
