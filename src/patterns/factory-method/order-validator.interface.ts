import { Order } from '../../domain/entities/order.entity';

export interface ValidationResult {
  isValid: boolean;
  errors: string[];
}

export type ValidatorType = 'Standard' | 'LargeOrder';

export interface OrderValidator {
  readonly validatorType: ValidatorType;
  validate(order: Order): ValidationResult;
}
