import { Order, OrderSide } from '../../domain/entities/order.entity';

export interface GetOrderRequest {
  orderId: string;
}

export interface CreateOrderRequest {
  accountId: string;
  symbol: string;
  side: OrderSide;
  quantity: number;
  price: number;
}

/** Request tag -> request shape and response shape. */
export interface MediatorRequests {
  GetOrder: { request: GetOrderRequest; response: Order | undefined };
  CreateOrder: { request: CreateOrderRequest; response: Order };
}

export type RequestType = keyof MediatorRequests;
export type RequestOf<K extends RequestType> = MediatorRequests[K]['request'];
export type ResponseOf<K extends RequestType> = MediatorRequests[K]['response'];

export interface RequestHandler<K extends RequestType> {
  handle(request: RequestOf<K>, signal?: AbortSignal): Promise<ResponseOf<K>>;
}

// Every tag must have a handler; a missing one is a compile error.
export type HandlerRegistry = { [K in RequestType]: RequestHandler<K> };

export const MEDIATOR_HANDLERS = 'MEDIATOR_HANDLERS';
