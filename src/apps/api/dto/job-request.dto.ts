import { Type } from 'class-transformer';
import {
  ArrayMaxSize,
  ArrayMinSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsInt,
  IsNotEmpty,
  IsOptional,
  IsString,
  IsUrl,
  Max,
  Min,
  ValidateNested,
} from 'class-validator';
import { HARD_MAX_PAGES_LIMIT } from '@/shared/config/env.validation';
import type { OutputFormat } from '@/shared/crawl/interfaces/job-request.interface';

const OUTPUT_FORMATS: OutputFormat[] = ['markdown', 'text', 'html'];

const URL_OPTIONS = {
  protocols: ['http', 'https'],
  require_protocol: true,
  require_tld: false,
};

export class SelectorDto {
  @IsString()
  @IsNotEmpty()
  name!: string;

  @IsString()
  @IsNotEmpty()
  selector!: string;

  @IsString()
  @IsOptional()
  attr?: string;
}

abstract class BaseJobDto {
  @IsInt()
  @Min(0)
  @IsOptional()
  timeout_ms?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  delay_ms?: number;

  @IsBoolean()
  @IsOptional()
  use_browser: boolean = false;
}

export class ScrapeJobDto extends BaseJobDto {
  @IsUrl(URL_OPTIONS)
  url!: string;

  @IsIn(OUTPUT_FORMATS)
  @IsOptional()
  format: OutputFormat = 'markdown';

  @IsBoolean()
  @IsOptional()
  include_links: boolean = false;

  @IsBoolean()
  @IsOptional()
  include_images: boolean = false;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SelectorDto)
  @IsOptional()
  selectors?: SelectorDto[];
}

export class CrawlJobDto extends BaseJobDto {
  @IsArray()
  @ArrayMinSize(1)
  @ArrayMaxSize(HARD_MAX_PAGES_LIMIT)
  @IsUrl(URL_OPTIONS, { each: true })
  urls!: string[];

  @IsIn(OUTPUT_FORMATS)
  @IsOptional()
  format: OutputFormat = 'markdown';

  @IsInt()
  @Min(1)
  @IsOptional()
  batch_size?: number;

  @IsInt()
  @Min(0)
  @IsOptional()
  max_depth: number = 0;

  @IsBoolean()
  @IsOptional()
  same_domain: boolean = false;

  @IsBoolean()
  @IsOptional()
  include_links: boolean = false;

  @IsBoolean()
  @IsOptional()
  include_images: boolean = false;

  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => SelectorDto)
  @IsOptional()
  selectors?: SelectorDto[];
}

export class MapJobDto extends BaseJobDto {
  @IsUrl(URL_OPTIONS)
  url!: string;

  @IsInt()
  @Min(0)
  @IsOptional()
  max_depth?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  max_pages?: number;

  @IsInt()
  @Min(1)
  @IsOptional()
  batch_size?: number;

  @IsBoolean()
  @IsOptional()
  same_domain: boolean = true;

  @IsBoolean()
  @IsOptional()
  include_content: boolean = false;

  @IsIn(OUTPUT_FORMATS)
  @IsOptional()
  format: OutputFormat = 'markdown';

  @IsString({ each: true })
  @IsArray()
  @IsOptional()
  include_patterns: string[] = [];

  @IsString({ each: true })
  @IsArray()
  @IsOptional()
  exclude_patterns: string[] = [];
}

export class SearchJobDto extends BaseJobDto {
  @IsUrl(URL_OPTIONS)
  url!: string;

  @IsString()
  @IsNotEmpty()
  query!: string;

  @IsInt()
  @Min(1)
  @IsOptional()
  top_k: number = 5;
}

export class AgentJobDto extends BaseJobDto {
  @IsUrl(URL_OPTIONS)
  url!: string;

  @IsString()
  @IsNotEmpty()
  instruction!: string;

  @IsString()
  @IsOptional()
  model?: string;
}

export class ResultsQueryDto {
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(500)
  @IsOptional()
  limit: number = 50;

  @Type(() => Number)
  @IsInt()
  @Min(0)
  @IsOptional()
  offset: number = 0;
}
