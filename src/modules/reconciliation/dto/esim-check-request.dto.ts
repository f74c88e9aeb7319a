import { IsNotEmpty, IsString, Matches, MaxLength } from 'class-validator';

export class EsimCheckRequestDto {
  /**
   * ICCID, spaces and hyphens allowed
   *
   * @example "8944 5000 0000 1234 567"
   */
  @IsString()
  @IsNotEmpty()
  @MaxLength(64)
  @Matches(/^[A-Za-z0-9\s-]+$/, {
    message: 'iccid may only contain letters, digits, spaces and hyphens',
  })
  iccid!: string;
}
