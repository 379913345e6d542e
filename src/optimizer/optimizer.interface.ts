export interface OptimizationRequest {
  title: string;
  html: string;
  focusKeyword: string;
  currentScore: number;
  categories: string[];
  tags: string[];
  image: string;
  schemaType: string;
}

export interface ImageMetadata {
  altText: string;
  imageTitle: string;
  imageCaption: string;
  imageDescription: string;
}

export interface ScoreCheck {
  check: string;
  points: number;
}

export interface ScoreReport {
  score: number;
  checks: ScoreCheck[];
  wordCount: number;
  keywordCount: number;
  keywordDensity: number;
}

export interface OptimizationResult {
  optimizedTitle: string;
  optimizedMetaDescription: string;
  optimizedHtml: string;
  optimizedBody: string;
  suggestedTags: string[];
  imageMetadata: ImageMetadata;
  scoreBefore: number;
  scoreAfter: number;
  improvement: number;
  scoreBreakdown: ScoreCheck[];
  wordCount: number;
  keywordDensity: number;
  titleLength: number;
  metaLength: number;
  degradedSteps: string[];
}

export type StepStatus = 'ok' | 'fallback';

export interface StepOutcome<T> {
  value: T;
  status: StepStatus;
}

export interface SiteSettings {
  siteUrl: string;
  authorName: string;
  publisherName: string;
  publisherLogo: string;
}

/** Inclusive integer draw in [min, max]. */
export type RandomInt = (min: number, max: number) => number;
