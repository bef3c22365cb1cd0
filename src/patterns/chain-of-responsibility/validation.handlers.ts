import { Logger } from '@nestjs/common';
import { AccountRepository } from './account.repository';
import { Order } from '../../domain/entities/order.entity';
import { orderValue } from '../../domain/order.util';
import { ValidationResult } from '../factory-method/order-validator.interface';

export interface ValidationHandler {
  readonly handlerName: string;
  /** Links the next handler and returns it, so chains read left to right. */
  setNext(handler: ValidationHandler): ValidationHandler;
  handle(order: Order, signal?: AbortSignal): Promise<ValidationResult>;
}

export const VALIDATION_CHAIN = 'VALIDATION_CHAIN';
export const MAX_ORDER_VALUE = 1000000;

function toResult(errors: string[]): ValidationResult {
  return { isValid: errors.length === 0, errors };
}

/**
 * Runs this handler's own checks; on success hands the order to the next
 * handler, on failure stops the chain and returns the errors.
 */
export abstract class BaseValidationHandler implements ValidationHandler {
  protected readonly logger = new Logger(this.constructor.name);
  private next?: ValidationHandler;

  get handlerName(): string {
    return this.constructor.name;
  }

  setNext(handler: ValidationHandler): ValidationHandler {
    this.next = handler;
    return handler;
  }

  async handle(order: Order, signal?: AbortSignal): Promise<ValidationResult> {
    signal?.throwIfAborted();
    const result = await this.validate(order);

    if (!result.isValid) {
      this.logger.debug(`Order ${order.orderId} stopped at ${this.handlerName}: ${result.errors.join(', ')}`);
      return result;
    }
    return this.next ? this.next.handle(order, signal) : result;
  }

  protected abstract validate(order: Order): Promise<ValidationResult>;
}

export class BasicValidationHandler extends BaseValidationHandler {
  protected async validate(order: Order): Promise<ValidationResult> {
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
    return toResult(errors);
  }
}

export class RiskValidationHandler extends BaseValidationHandler {
  protected async validate(order: Order): Promise<ValidationResult> {
    const value = orderValue(order);
    return toResult(
      value.greaterThan(MAX_ORDER_VALUE) ? [`Order value ${value.toString()} exceeds maximum ${MAX_ORDER_VALUE}`] : [],
    );
  }
}

export class AccountValidationHandler extends BaseValidationHandler {
  constructor(private readonly accounts: AccountRepository) {
    super();
  }

  protected async validate(order: Order): Promise<ValidationResult> {
    const account = await this.accounts.getById(order.accountId);
    return toResult(account ? [] : [`Account ${order.accountId} not found`]);
  }
}

/** Basic -> Risk -> Account. Returns the head of the chain. */
export function buildValidationChain(accounts: AccountRepository): ValidationHandler {
  const head = new BasicValidationHandler();
  head.setNext(new RiskValidationHandler()).setNext(new AccountValidationHandler(accounts));
  return head;
}
