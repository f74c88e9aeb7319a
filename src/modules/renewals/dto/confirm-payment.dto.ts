import { IsNotEmpty, IsString, MaxLength } from 'class-validator';

export class ConfirmPaymentDto {
  /**
   * Checkout session id returned by /renewal/create
   */
  @IsString()
  @IsNotEmpty()
  @MaxLength(255)
  sessionId!: string;
}
