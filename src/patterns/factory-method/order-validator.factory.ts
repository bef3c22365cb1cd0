import { Injectable } from '@nestjs/common';
import { Order } from '../../domain/entities/order.entity';
import { OrderValidator } from './order-validator.interface';
import { LARGE_ORDER_THRESHOLD, LargeOrderValidator, StandardOrderValidator } from './order-validators';
import { orderValue } from '../../domain/order.util';

// Picks the validator from the order's value. Callers only see OrderValidator.
@Injectable()
export class OrderValidatorFactory {
  createValidator(order: Order): OrderValidator {
    if (orderValue(order).greaterThanOrEqualTo(LARGE_ORDER_THRESHOLD)) {
      return new LargeOrderValidator();
    }
    return new StandardOrderValidator();
  }
}
