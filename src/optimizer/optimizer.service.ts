import { Inject, Injectable, Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { OptimizerConfig } from '../config/config';
import { analyzeText } from '../utils/text-analyzer';
import { rewriteBody } from './content-rewriter';
import { assembleDocument } from './document-builder';
import {
  buildImageMetadata,
  buildMetaDescription,
  buildTitle,
  fallbacks,
  suggestTags,
} from './metadata-builder';
import {
  OptimizationRequest,
  OptimizationResult,
  RandomInt,
  ScoreCheck,
  ScoreReport,
  SiteSettings,
  StepOutcome,
} from './optimizer.interface';
import { RANDOM_INT } from './random.provider';
import { fallbackScore, scoreDocument } from './seo-scorer';

@Injectable()
export class OptimizerService {
  private readonly logger = new Logger(OptimizerService.name);
  private readonly config: OptimizerConfig;

  constructor(
    private readonly configService: ConfigService,
    @Inject(RANDOM_INT) private readonly randomInt: RandomInt,
  ) {
    this.config = this.configService.getOrThrow<OptimizerConfig>('optimizer');
  }

  get site(): SiteSettings {
    const { siteUrl, authorName, publisherName, publisherLogo } = this.config;
    return { siteUrl, authorName, publisherName, publisherLogo };
  }

  optimize(request: OptimizationRequest): OptimizationResult {
    const keyword = request.focusKeyword;
    const degradedSteps: string[] = [];
    this.logger.debug(`Optimizing "${request.title}" for keyword "${keyword}"`);

    const run = <T>(step: string, fn: () => T, fallback: () => T): T => {
      const outcome = this.attempt(step, fn, fallback);
      if (outcome.status === 'fallback') degradedSteps.push(step);
      return outcome.value;
    };

    const title = run(
      'title',
      () => buildTitle(request.title, keyword),
      () => fallbacks.title(request.title, keyword),
    );
    const metaDescription = run(
      'meta_description',
      () => buildMetaDescription(request.html, keyword),
      () => fallbacks.metaDescription(keyword),
    );
    const tags = run(
      'tags',
      () => suggestTags(keyword, this.randomInt, this.config.suggestedTagCount),
      () => fallbacks.tags(keyword),
    );
    const imageMetadata = run(
      'image_metadata',
      () => buildImageMetadata(keyword),
      () => fallbacks.imageMetadata(keyword),
    );
    const body = run(
      'body',
      () => rewriteBody(request.html, keyword),
      () => request.html,
    );
    const analysis = run(
      'content_analysis',
      () => analyzeText(body, keyword),
      () => ({ text: '', wordCount: 0, keywordCount: 0, keywordDensity: 0 }),
    );

    const optimizedHtml = assembleDocument(
      {
        title,
        metaDescription,
        keyword,
        existingTags: request.tags,
        tags,
        categories: request.categories,
        image: request.image,
        imageMetadata,
        schemaType: request.schemaType,
        body,
      },
      this.site,
    );

    const score = run<{ score: number; checks: ScoreCheck[] }>(
      'score',
      () =>
        scoreDocument(optimizedHtml, keyword, request.currentScore, {
          siteUrl: this.config.siteUrl,
          bodyHtml: body,
        }),
      () => ({ score: fallbackScore(request.currentScore), checks: [] }),
    );

    this.logger.log(
      `Score for "${keyword}": ${request.currentScore} -> ${score.score}` +
        (degradedSteps.length ? ` (fallbacks: ${degradedSteps.join(', ')})` : ''),
    );

    return {
      optimizedTitle: title,
      optimizedMetaDescription: metaDescription,
      optimizedHtml,
      optimizedBody: body,
      suggestedTags: tags,
      imageMetadata,
      scoreBefore: request.currentScore,
      scoreAfter: score.score,
      improvement: score.score - request.currentScore,
      scoreBreakdown: score.checks,
      wordCount: analysis.wordCount,
      keywordDensity: analysis.keywordDensity,
      titleLength: title.length,
      metaLength: metaDescription.length,
      degradedSteps,
    };
  }

  analyze(html: string, keyword: string): ScoreReport {
    return scoreDocument(html, keyword, 0, { siteUrl: this.config.siteUrl });
  }

  private attempt<T>(step: string, fn: () => T, fallback: () => T): StepOutcome<T> {
    try {
      return { value: fn(), status: 'ok' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(`Step "${step}" failed, using fallback: ${message}`);
      return { value: fallback(), status: 'fallback' };
    }
  }
}
