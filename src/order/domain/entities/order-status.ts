import { ErrorCode, ValidationException } from '@common/exception';

/**
 * 주문 상태
 */
export const OrderStatus = {
  ORDER: 'ORDER',
  CANCEL: 'CANCEL',
} as const;

export type OrderStatus = (typeof OrderStatus)[keyof typeof OrderStatus];

export function parseOrderStatus(value: string): OrderStatus {
  switch (value.toUpperCase()) {
    case OrderStatus.ORDER:
      return OrderStatus.ORDER;
    case OrderStatus.CANCEL:
      return OrderStatus.CANCEL;
    default:
      throw new ValidationException(ErrorCode.INVALID_ORDER_STATUS);
  }
}

/**
 * 배송 상태
 */
export const DeliveryStatus = {
  READY: 'READY',
  COMP: 'COMP',
} as const;

export type DeliveryStatus =
  (typeof DeliveryStatus)[keyof typeof DeliveryStatus];
