/**
 * AirHub API response shapes
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

export class AirhubLoginDataDto {
  @IsOptional()
  @ToOptionalString()
  @IsString()
  partnerCode?: string;
}

/**
 * POST /api/Authentication/UserLogin
 */
export class AirhubLoginResponseDto {
  @IsOptional()
  @ToOptionalBoolean()
  @IsBoolean()
  isSuccess?: boolean;

  @IsOptional()
  @IsString()
  token?: string;

  @IsOptional()
  @IsString()
  message?: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => AirhubLoginDataDto)
  data?: AirhubLoginDataDto;
}

export class AirhubOrderDto {
  @IsOptional()
  @ToOptionalString()
  @IsString()
  orderId?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  simID?: string;

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
  planName?: string;

  @IsOptional()
  @ToOptionalBoolean()
  @IsBoolean()
  isActive?: boolean;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  purchaseDate?: string;

  /**
   * Validity in days (field name as sent by the API)
   */
  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  vaildity?: number;

  @IsOptional()
  @ToOptionalNumber()
  @IsNumber()
  capacity?: number;

  @IsOptional()
  @IsString()
  capacityUnit?: string;

  /**
   * @example "1.25 GB"
   */
  @IsOptional()
  @ToOptionalString()
  @IsString()
  dataConsumed?: string;

  @IsOptional()
  @ToOptionalString()
  @IsString()
  dataRemaining?: string;
}

/**
 * POST /api/ESIM/GetOrderDetail
 */
export class AirhubOrderListResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AirhubOrderDto)
  getOrderdetails?: AirhubOrderDto[];
}

export class AirhubActivationDto {
  @IsOptional()
  @IsString()
  activationCode?: string;

  @IsOptional()
  @IsString()
  apn?: string;
}

/**
 * POST /api/ESIM/GetActivationCode
 */
export class AirhubActivationResponseDto {
  @IsOptional()
  @IsArray()
  @ValidateNested({ each: true })
  @Type(() => AirhubActivationDto)
  getOrderdetails?: AirhubActivationDto[];
}
