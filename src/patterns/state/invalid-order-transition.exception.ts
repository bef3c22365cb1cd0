import { ConflictException } from '@nestjs/common';
import { OrderStatus } from '../../domain/entities/order.entity';

export type OrderTransition = 'place' | 'fill' | 'cancel' | 'reject';

export class InvalidOrderTransitionException extends ConflictException {
  constructor(
    readonly from: OrderStatus,
    readonly transition: OrderTransition,
    message: string,
  ) {
    super(message);
  }
}
