/**
 * TravelRoam API response shapes
 */

import { Type } from 'class-transformer';
import {
  IsArray,
  IsNumber,
  IsOptional,
  IsString,
  ValidateNested,
} from 'class-validator';
import {
  ToOptionalNumber,
  ToOptionalString,
} from '../../../../core/validation/transforms';

/**
 * POST /esims/details
 */
export class TravelroamEsimDetailsDto {
  @IsOptional()
  @ToOptionalString()
  @IsString()
  iccid?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  matchingId?: string;

  @IsOptional()
  @IsString()
  profileStatus?: string;

  @IsOptional()
  @IsString()
  smdpAddress?: string;

  /**
   * Epoch milliseconds
   */
  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  firstInstalledDateTime?: number;
}

export class TravelroamAssignmentDto {
  @IsOptional()
  @IsString()
  callTypeGroup?: string;

  /**
   * Bytes
   */
  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  initialQuantity?: number;

  /**
   * Bytes
   */
  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  remainingQuantity?: number;

  @IsOptional()
  @IsString()
  startTime?: string;

  @IsOptional()
  @IsString()
  endTime?: string;
}

export class TravelroamAppliedBundleDto {
  @IsOptional()
  @IsString()
  name?: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TravelroamAssignmentDto)
  assignments?: TravelroamAssignmentDto[];
}

/**
 * POST /esims/applied/bundles
 */
export class TravelroamAppliedBundlesResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TravelroamAppliedBundleDto)
  bundles?: TravelroamAppliedBundleDto[];
}

/**
 * POST /esims/location
 */
export class TravelroamLocationDto {
  @IsOptional()
  @IsString()
  networkName?: string;

  @IsOptional()
  @IsString()
  networkBrandName?: string;

  @IsOptional()
  @IsString()
  country?: string;
}

export class TravelroamCatalogBundleDto {
  @IsString()
  name!: string;

  @IsOptional()
  @IsString()
  description?: string;

  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  data?: number;

  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  validity?: number;

  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  price?: number;
}

/**
 * POST /catalogue
 */
export class TravelroamCatalogResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => TravelroamCatalogBundleDto)
  bundles?: TravelroamCatalogBundleDto[];
}
