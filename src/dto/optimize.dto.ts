import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Transform } from 'class-transformer';
import {
  IsArray,
  IsDefined,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  Max,
  Min,
} from 'class-validator';

export class AnalyzeContentDto {
  @ApiProperty({ description: 'Complete HTML document or fragment to score' })
  @IsDefined()
  @IsString()
  html_code!: string;

  @ApiProperty({ description: 'Focus keyword', example: 'Vize Başvurusu' })
  @Transform(({ value }) => (typeof value === 'string' ? value.trim() : value))
  @IsDefined()
  @IsString()
  @IsNotEmpty({ message: 'focus_keyword should not be empty' })
  focus_keyword!: string;
}

export class OptimizeContentDto extends AnalyzeContentDto {
  @ApiProperty({ description: 'Current post title', example: 'Başvuru Rehberi' })
  @IsDefined()
  @IsString()
  title!: string;

  @ApiProperty({ description: 'Current Rank Math score', minimum: 0, maximum: 100 })
  @IsDefined()
  @IsInt()
  @Min(0)
  @Max(100)
  seo_score!: number;

  @ApiPropertyOptional({ type: [String], default: ['Blog'] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  categories?: string[];

  @ApiPropertyOptional({ type: [String], default: [] })
  @IsOptional()
  @IsArray()
  @IsString({ each: true })
  tags?: string[];

  @ApiPropertyOptional({ description: 'Featured image URL', default: '' })
  @IsOptional()
  @IsString()
  image?: string;

  @ApiPropertyOptional({ description: 'schema.org type', default: 'Article' })
  @IsOptional()
  @IsString()
  schema?: string;
}
