import { BadRequestException } from '@nestjs/common';
import { OrderBuilder } from './order.builder';
import { OrderSide, OrderStatus } from '../../domain/entities/order.entity';

describe('OrderBuilder', () => {
  let builder: OrderBuilder;

  const complete = () =>
    builder
      .reset()
      .withAccount('ACC-001')
      .withSymbol('AAPL')
      .withSide(OrderSide.BUY)
      .withQuantity(100)
      .withPrice(150);

  beforeEach(() => {
    builder = new OrderBuilder();
  });

  it('should build a pending order with every field set', () => {
    const order = complete().build();

    expect(order.orderId).toMatch(/^ORD-[0-9a-f]{32}$/);
    expect(order).toMatchObject({
      accountId: 'ACC-001',
      symbol: 'AAPL',
      side: OrderSide.BUY,
      quantity: 100,
      price: 150,
      status: OrderStatus.PENDING,
      rowVersion: 0,
    });
    expect(order.limitPrice).toBeUndefined();
    expect(order.createdAt).toBeInstanceOf(Date);
  });

  it('should carry the optional limit price', () => {
    expect(complete().withLimitPrice(149.5).build().limitPrice).toBe(149.5);
  });

  it('should give every build a fresh id', () => {
    expect(complete().build().orderId).not.toBe(complete().build().orderId);
  });

  it.each([
    { field: 'account', build: () => builder.reset().build(), message: 'Account ID is required' },
    { field: 'symbol', build: () => builder.reset().withAccount('ACC-001').build(), message: 'Symbol is required' },
    {
      field: 'side',
      build: () => builder.reset().withAccount('ACC-001').withSymbol('AAPL').build(),
      message: 'Side is required',
    },
    { field: 'quantity', build: () => complete().withQuantity(0).build(), message: 'Quantity must be greater than zero' },
    { field: 'price', build: () => complete().withPrice(-1).build(), message: 'Price must be greater than zero' },
  ])('should reject a missing or invalid $field', ({ build, message }) => {
    expect(build).toThrow(BadRequestException);
    expect(build).toThrow(message);
  });

  it('should forget the draft on reset', () => {
    complete();
    expect(() => builder.reset().withSymbol('AAPL').build()).toThrow('Account ID is required');
  });
});
