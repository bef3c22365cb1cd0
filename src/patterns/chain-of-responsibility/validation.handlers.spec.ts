import {
  BasicValidationHandler,
  RiskValidationHandler,
  ValidationHandler,
  buildValidationChain,
} from './validation.handlers';
import { InMemoryAccountRepository } from './account.repository';
import { Order, OrderSide } from '../../domain/entities/order.entity';
import { NewOrderFields, createOrder } from '../../domain/order.util';

describe('validation chain', () => {
  let chain: ValidationHandler;

  const order = (fields: Partial<NewOrderFields> = {}): Order =>
    createOrder({ accountId: 'ACC-001', symbol: 'AAPL', side: OrderSide.BUY, quantity: 10, price: 100, ...fields });

  beforeEach(() => {
    chain = buildValidationChain(new InMemoryAccountRepository());
  });

  it('should pass an order that every handler accepts', async () => {
    expect(await chain.handle(order())).toEqual({ isValid: true, errors: [] });
  });

  it('should stop at the basic handler with all of its errors', async () => {
    const result = await chain.handle(order({ symbol: ' ', quantity: -10, accountId: 'ACC-MISSING' }));

    expect(result).toEqual({
      isValid: false,
      errors: ['Quantity must be greater than zero', 'Symbol is required'],
    });
  });

  it('should report the order value when the risk handler refuses', async () => {
    const result = await chain.handle(order({ quantity: 10000, price: 300, accountId: 'ACC-MISSING' }));

    expect(result.errors).toEqual(['Order value 3000000 exceeds maximum 1000000']);
  });

  it('should accept an order worth exactly the maximum', async () => {
    expect((await chain.handle(order({ quantity: 10000, price: 100 }))).isValid).toBe(true);
  });

  it('should refuse an unknown account at the end of the chain', async () => {
    expect(await chain.handle(order({ accountId: 'ACC-404' }))).toEqual({
      isValid: false,
      errors: ['Account ACC-404 not found'],
    });
  });

  it('should return the handler passed to setNext', () => {
    const basic = new BasicValidationHandler();
    const risk = new RiskValidationHandler();

    expect(basic.setNext(risk)).toBe(risk);
    expect(risk.handlerName).toBe('RiskValidationHandler');
  });

  it('should not consult later handlers once one fails', async () => {
    const basic = new BasicValidationHandler();
    const risk = new RiskValidationHandler();
    const riskHandle = jest.spyOn(risk, 'handle');
    basic.setNext(risk);

    await basic.handle(order({ price: 0 }));

    expect(riskHandle).not.toHaveBeenCalled();
  });
});
