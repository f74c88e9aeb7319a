import { Transform } from 'class-transformer';
import {
  IsEmail,
  IsEnum,
  IsInt,
  IsNotEmpty,
  IsNumber,
  IsOptional,
  IsPositive,
  IsString,
  Length,
  Matches,
  MaxLength,
} from 'class-validator';
import { ProviderId } from '../../../domain/esim';

export class CreateRenewalOrderDto {
  @IsString()
  @IsNotEmpty()
  @MaxLength(50)
  iccid!: string;

  @Transform(({ value }: { value: unknown }) =>
    typeof value === 'string' ? value.trim().toUpperCase() : value,
  )
  @IsEnum(ProviderId)
  provider!: ProviderId;

  /**
   * Amount in major currency units
   *
   * @example 9.99
   */
  @IsNumber({ maxDecimalPlaces: 2 })
  @IsPositive()
  amount!: number;

  /**
   * ISO 4217 code
   * Default: USD
   */
  @IsOptional()
  @Matches(/^[A-Za-z]{3}$/)
  currency?: string;

  /**
   * Provider order or SIM reference, required for AIRHUB
   */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  orderSimId?: string;

  /**
   * Plan label from the eSIM check, used to resolve a TravelRoam bundle
   *
   * @example "eSIM, 1GB, 7 Days, Turkey, V2"
   */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  planName?: string;

  /**
   * eSIMCard package type id or TravelRoam bundle name
   */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  packageId?: string;

  /**
   * Shown on the checkout page
   */
  @IsOptional()
  @IsString()
  @MaxLength(200)
  packageName?: string;

  /**
   * AIRHUB only
   * Default: 7
   */
  @IsOptional()
  @IsInt()
  @IsPositive()
  renewalDays?: number;

  @IsOptional()
  @IsString()
  @Length(2, 2)
  countryCode?: string;

  /**
   * eSIMCard device identifier; defaults to the ICCID
   */
  @IsOptional()
  @IsString()
  @MaxLength(255)
  deviceIdentifier?: string;

  @IsOptional()
  @IsEmail()
  customerEmail?: string;
}

export interface CreateRenewalOrderResponseDto {
  orderId: string;
  sessionId: string;
  checkoutUrl: string | null;
  amount: number;
  currency: string;
}
