/**
 * eSIMCard reseller API response shapes
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsBoolean,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  ToOptionalBoolean,
  ToOptionalNumber,
  ToOptionalString,
} from '../../../../core/validation/transforms';

export class EsimcardEnvelopeDto {
  @IsOptional()
  @ToOptionalBoolean()
  @IsBoolean()
  status?: boolean;

  @IsOptional()
  @IsString()
  message?: string;
}

/**
 * POST /login
 */
export class EsimcardLoginResponseDto extends EsimcardEnvelopeDto {
  @IsOptional()
  @IsString()
  access_token?: string;
}

export class EsimcardSimSummaryDto {
  @IsOptional()
  @ToOptionalString()
  @IsString()
  id?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  iccid?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  ICCID?: string;

  @IsOptional()
  @IsString()
  status?: string;
}

/**
 * GET /my-esims
 */
export class EsimcardSimListResponseDto extends EsimcardEnvelopeDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EsimcardSimSummaryDto)
  data?: EsimcardSimSummaryDto[];
}

export class EsimcardSimDto extends EsimcardSimSummaryDto {
  @IsOptional()
  @IsString()
  last_bundle?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  created_at?: string;

  @IsOptional()
  @IsString()
  qr_code_text?: string;

  @IsOptional()
  @IsString()
  qr_code?: string;

  @IsOptional()
  @IsString()
  activation_code?: string;

  @IsOptional()
  @IsString()
  lpa?: string;

  @IsOptional()
  @IsString()
  apn?: string;
}

/**
 * Package usage figures. Also the shape of GET /my-sim/{id}/usage
 */
export class EsimcardPackageUsageDto {
  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  initial_data_quantity?: number;

  @IsOptional()
  @IsString()
  initial_data_unit?: string;

  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  rem_data_quantity?: number;

  @IsOptional()
  @IsString()
  rem_data_unit?: string;
}

export class EsimcardSimDetailsDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => EsimcardSimDto)
  sim?: EsimcardSimDto;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EsimcardPackageUsageDto)
  in_use_packages?: EsimcardPackageUsageDto[];

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => EsimcardPackageUsageDto)
  assigned_packages?: EsimcardPackageUsageDto[];
}

/**
 * GET /my-esims/{id}
 */
export class EsimcardSimDetailsResponseDto extends EsimcardEnvelopeDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => EsimcardSimDetailsDto)
  data?: EsimcardSimDetailsDto;
}

/**
 * GET /my-sim/{id}/usage
 */
export class EsimcardUsageResponseDto extends EsimcardEnvelopeDto {
  @IsOptional()
  @ValidateNested()
  @Type(() => EsimcardPackageUsageDto)
  data?: EsimcardPackageUsageDto;
}
