import { Injectable } from '@nestjs/common';
import { OrderValidatorFactory } from './order-validator.factory';
import { ValidatorType } from './order-validator.interface';
import { OrderSide } from '../../domain/entities/order.entity';
import { createOrder, orderValue } from '../../domain/order.util';
import { toNumber } from '../../common/utils/decimal.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Factory Method';

export interface ValidatorSelection {
  orderType: 'Standard' | 'Large';
  orderValue: number;
  validatorType: ValidatorType;
  isValid: boolean;
  errors: string[];
}

@Injectable()
export class FactoryMethodScenario implements PatternScenario {
  constructor(private readonly factory: OrderValidatorFactory) {}

  async runDemo(): Promise<PatternDemoResponse<ValidatorSelection[]>> {
    const standardOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 100, price: 150 },
      'ORD-001',
    );
    const largeOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'MSFT', side: OrderSide.BUY, quantity: 1000, price: 300 },
      'ORD-002',
    );

    const result = [
      { orderType: 'Standard' as const, order: standardOrder },
      { orderType: 'Large' as const, order: largeOrder },
    ].map(({ orderType, order }): ValidatorSelection => {
      const validator = this.factory.createValidator(order);
      const validation = validator.validate(order);
      return {
        orderType,
        orderValue: toNumber(orderValue(order)),
        validatorType: validator.validatorType,
        isValid: validation.isValid,
        errors: validation.errors,
      };
    });

    return {
      pattern: PATTERN,
      description:
        'Demonstrates factory method pattern: different validators created based on order characteristics.',
      result,
      metadata: {
        factoryType: 'OrderValidatorFactory',
        extensibility: 'New validator types are added without modifying existing ones',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const standardOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 10, price: 100 },
      'TEST-001',
    );
    const largeOrder = createOrder(
      { accountId: 'ACC-001', symbol: 'MSFT', side: OrderSide.BUY, quantity: 1000, price: 200 },
      'TEST-002',
    );

    const standardValidator = this.factory.createValidator(standardOrder);
    const largeValidator = this.factory.createValidator(largeOrder);
    const validation = standardValidator.validate(standardOrder);

    return toTestResponse(PATTERN, [
      check(
        'Standard Order Validator',
        standardValidator.validatorType === 'Standard',
        `Created ${standardValidator.validatorType} validator for standard order`,
      ),
      check(
        'Large Order Validator',
        largeValidator.validatorType === 'LargeOrder',
        `Created ${largeValidator.validatorType} validator for large order (value: ${orderValue(largeOrder).toString()})`,
      ),
      check('Validation Works', validation.isValid, `Standard validator returned isValid=${validation.isValid}`),
    ]);
  }
}
