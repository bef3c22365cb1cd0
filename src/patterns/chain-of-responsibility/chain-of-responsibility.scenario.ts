import { Inject, Injectable } from '@nestjs/common';
import { VALIDATION_CHAIN, ValidationHandler } from './validation.handlers';
import { ValidationResult } from '../factory-method/order-validator.interface';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import { NewOrderFields, createOrder, orderValue } from '../../domain/order.util';
import { toNumber } from '../../common/utils/decimal.util';
import {
  PatternDemoResponse,
  PatternScenario,
  PatternTestResponse,
} from '../../common/interfaces/pattern-response.interface';
import { check, toTestResponse } from '../../common/utils/pattern-response.util';

const PATTERN = 'Chain of Responsibility';

export interface ChainCase {
  order: string;
  orderValue?: number;
  result: ValidationResult;
}

function testOrder(fields: Partial<NewOrderFields>, orderId: string): Order {
  return createOrder(
    { accountId: 'ACC-001', symbol: 'TEST', side: OrderSide.BUY, quantity: 10, price: 100, ...fields },
    orderId,
  );
}

@Injectable()
export class ChainOfResponsibilityScenario implements PatternScenario {
  constructor(@Inject(VALIDATION_CHAIN) private readonly chain: ValidationHandler) {}

  async runDemo(): Promise<PatternDemoResponse<ChainCase[]>> {
    const valid = testOrder({ symbol: 'AAPL', quantity: 100, price: 150 }, 'ORD-CHAIN-001');
    const invalid = testOrder({ symbol: '', quantity: -10, price: 150 }, 'ORD-CHAIN-002');
    const risky = testOrder({ symbol: 'MSFT', quantity: 10000, price: 300 }, 'ORD-CHAIN-003');

    return {
      pattern: PATTERN,
      description:
        'Demonstrates chain of responsibility pattern: validation pipeline where each handler ' +
        'processes or passes to next.',
      result: [
        { order: 'Valid Order', result: await this.chain.handle(valid) },
        { order: 'Invalid Order (Basic Validation)', result: await this.chain.handle(invalid) },
        {
          order: 'Risk Validation',
          orderValue: toNumber(orderValue(risky)),
          result: await this.chain.handle(risky),
        },
      ],
      metadata: {
        chainOrder: 'Basic -> Risk -> Account',
        flexibility: 'Easy to add/remove/reorder handlers',
      },
    };
  }

  async runTest(): Promise<PatternTestResponse> {
    const valid = await this.chain.handle(testOrder({}, 'ORD-TEST'));
    const invalid = await this.chain.handle(testOrder({ symbol: '', quantity: -10 }, 'ORD-TEST'));
    const risky = await this.chain.handle(testOrder({ quantity: 10000, price: 300 }, 'ORD-TEST'));
    const unknownAccount = await this.chain.handle(testOrder({ accountId: 'ACC-MISSING' }, 'ORD-TEST'));

    return toTestResponse(PATTERN, [
      check('Valid Order Passes', valid.isValid, 'Valid order passed all validation handlers'),
      check(
        'Invalid Order Fails',
        !invalid.isValid && invalid.errors.length > 0,
        `Validation failed with errors: ${invalid.errors.join(', ')}`,
      ),
      check(
        'Chain Processes in Order',
        !risky.isValid && risky.errors.some(e => e.includes('exceeds maximum')),
        'Risk validation handler caught the error',
      ),
      check(
        'Account Validation',
        unknownAccount.errors.includes('Account ACC-MISSING not found'),
        'Account validation handler rejected an unknown account',
      ),
    ]);
  }
}
