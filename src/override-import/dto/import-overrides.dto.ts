import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsEnum, IsIn, IsNotEmpty, IsOptional, IsString } from 'class-validator';
import { ImportMode } from '../override-import.types';
import { CSV_DELIMITER_NAMES, CsvDelimiterName } from '../override-import.constants';

export class ImportOverridesDto {
  @ApiProperty({ enum: ImportMode, description: 'Whether rows are keyed by user or by group' })
  @IsEnum(ImportMode)
  mode!: ImportMode;

  @ApiPropertyOptional({ enum: CSV_DELIMITER_NAMES, default: 'comma' })
  @IsOptional()
  @IsIn(CSV_DELIMITER_NAMES)
  delimiter?: CsvDelimiterName;

  @ApiPropertyOptional({ example: 'utf-8', default: 'utf-8' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  encoding?: string;
}

export class OverrideTemplateQueryDto {
  @ApiProperty({ enum: ImportMode })
  @IsEnum(ImportMode)
  mode!: ImportMode;
}
