import { IsEmail, IsNotEmpty, IsNumber, IsPositive, IsString } from 'class-validator';

// Body of POST /api/strategy-advanced/process-payment.
// Provider-specific limits (minimum amount, currencies) are checked by the provider, not here.
export class ProcessPaymentDto {
  @IsNumber()
  @IsPositive()
  amount!: number;

  @IsString()
  @IsNotEmpty()
  currency!: string;       // case-insensitive, e.g. usd

  @IsString()
  @IsNotEmpty()
  providerKey!: string;    // stripe, paypal, crypto

  @IsEmail()
  customerEmail!: string;
}
