import {
  OrderStatus,
  parseOrderStatus,
} from '@/order/domain/entities/order-status';
import { ErrorCode, ValidationException } from '@common/exception';

describe('parseOrderStatus', () => {
  it('대소문자 구분 없이 주문 상태로 변환한다', () => {
    expect(parseOrderStatus('ORDER')).toBe(OrderStatus.ORDER);
    expect(parseOrderStatus('cancel')).toBe(OrderStatus.CANCEL);
  });

  it('알 수 없는 값이면 INVALID_ORDER_STATUS 예외를 던진다', () => {
    expect(() => parseOrderStatus('SHIPPED')).toThrow(
      new ValidationException(ErrorCode.INVALID_ORDER_STATUS),
    );
  });
});
