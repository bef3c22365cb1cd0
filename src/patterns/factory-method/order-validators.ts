import { Order } from '../../domain/entities/order.entity';
import { OrderValidator, ValidationResult, ValidatorType } from './order-validator.interface';
import { orderValue } from '../../domain/order.util';

/** Orders at or above this value get the LargeOrder validator. */
export const LARGE_ORDER_THRESHOLD = 100000;
const LARGE_ORDER_MAXIMUM = LARGE_ORDER_THRESHOLD * 10;

function basicErrors(order: Order): string[] {
  const errors: string[] = [];
  if (order.quantity <= 0) {
    errors.push('Quantity must be greater than zero');
  }
  if (order.price <= 0) {
    errors.push('Price must be greater than zero');
  }
  if (order.symbol.trim() === '') {
    errors.push('Symbol is required');
  }
  return errors;
}

function toResult(errors: string[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

export class StandardOrderValidator implements OrderValidator {
  readonly validatorType: ValidatorType = 'Standard';

  validate(order: Order): ValidationResult {
    return toResult(basicErrors(order));
  }
}

// Basic checks plus a hard ceiling at 10x the large-order threshold.
export class LargeOrderValidator implements OrderValidator {
  readonly validatorType: ValidatorType = 'LargeOrder';

  validate(order: Order): ValidationResult {
    const errors = basicErrors(order);
    if (orderValue(order).greaterThan(LARGE_ORDER_MAXIMUM)) {
      errors.push('Order value exceeds maximum allowed (10x threshold)');
    }
    return toResult(errors);
  }
}
