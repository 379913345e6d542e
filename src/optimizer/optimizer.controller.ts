import { Body, Controller, HttpCode, Post } from '@nestjs/common';
import { ApiTags } from '@nestjs/swagger';
import { AnalyzeContentDto, OptimizeContentDto } from '../dto/optimize.dto';
import { OptimizationRequest, OptimizationResult, ScoreReport } from './optimizer.interface';
import { OptimizerService } from './optimizer.service';

export function toOptimizationRequest(dto: OptimizeContentDto): OptimizationRequest {
  return {
    title: dto.title,
    html: dto.html_code,
    focusKeyword: dto.focus_keyword,
    currentScore: dto.seo_score,
    categories: dto.categories ?? ['Blog'],
    tags: dto.tags ?? [],
    image: dto.image ?? '',
    schemaType: dto.schema || 'Article',
  };
}

function toOptimizationResponse(result: OptimizationResult) {
  return {
    optimized_title: result.optimizedTitle,
    optimized_meta_description: result.optimizedMetaDescription,
    optimized_html: result.optimizedHtml,
    optimized_body: result.optimizedBody,
    suggested_tags: result.suggestedTags,
    image_metadata: {
      alt_text: result.imageMetadata.altText,
      image_title: result.imageMetadata.imageTitle,
      image_caption: result.imageMetadata.imageCaption,
      image_description: result.imageMetadata.imageDescription,
    },
    seo_score_before: result.scoreBefore,
    seo_score_after: result.scoreAfter,
    improvement: result.improvement,
    score_breakdown: result.scoreBreakdown,
    word_count: result.wordCount,
    keyword_density: result.keywordDensity,
    title_length: result.titleLength,
    meta_length: result.metaLength,
    degraded_steps: result.degradedSteps,
  };
}

function toAnalysisResponse(report: ScoreReport) {
  return {
    score: report.score,
    checks: report.checks,
    word_count: report.wordCount,
    keyword_count: report.keywordCount,
    keyword_density: report.keywordDensity,
  };
}

@ApiTags('optimizer')
@Controller('api')
export class OptimizerController {
  constructor(private readonly optimizerService: OptimizerService) {}

  @Post('optimize')
  @HttpCode(200)
  optimize(@Body() dto: OptimizeContentDto) {
    const result = this.optimizerService.optimize(toOptimizationRequest(dto));
    return { success: true, data: toOptimizationResponse(result) };
  }

  @Post('analyze')
  @HttpCode(200)
  analyze(@Body() dto: AnalyzeContentDto) {
    const report = this.optimizerService.analyze(dto.html_code, dto.focus_keyword);
    return { success: true, data: toAnalysisResponse(report) };
  }
}
