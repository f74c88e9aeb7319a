import { IsOptional, IsString, MaxLength } from 'class-validator';

export class RenewalPackagesQueryDto {
  /**
   * ISO country code(s), comma-separated
   *
   * @example "TR"
   */
  @IsOptional()
  @IsString()
  @MaxLength(200)
  countries?: string;

  /**
   * Free-text search on the bundle description
   *
   * @example "1GB"
   */
  @IsOptional()
  @IsString()
  @MaxLength(200)
  description?: string;
}
