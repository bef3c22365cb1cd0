import { Body, Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { PaymentService } from './payment.service';
import { ProcessPaymentDto } from './dto/process-payment.dto';
import { ProviderInfoDto } from './dto/provider-info.dto';
import { ProviderPaymentResult } from './payment-provider.interface';

@Controller('api/strategy-advanced')
export class StrategyAdvancedController {
  constructor(private readonly paymentService: PaymentService) {}

  /**
   * Routes the payment to the provider named by providerKey.
   * 404 for an unknown provider, 400 when the provider rejects amount or currency.
   *
   * POST /api/strategy-advanced/process-payment
   */
  @Post('process-payment')
  @HttpCode(HttpStatus.OK)
  processPayment(@Body() request: ProcessPaymentDto): Promise<ProviderPaymentResult> {
    return this.paymentService.processPayment(request);
  }

  /** GET /api/strategy-advanced/providers */
  @Get('providers')
  @HttpCode(HttpStatus.OK)
  getProviders(): ProviderInfoDto[] {
    return this.paymentService.getAvailableProviders();
  }
}
