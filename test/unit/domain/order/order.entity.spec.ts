import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { Delivery } from '@/order/domain/entities/delivery.entity';
import {
  DeliveryStatus,
  OrderStatus,
} from '@/order/domain/entities/order-status';
import { Member } from '@/member/domain/entities/member.entity';
import { Book } from '@/item/domain/entities/book.entity';
import { Address } from '@common/domain/address.vo';
import { ErrorCode, DomainException } from '@common/exception';
import { catchError } from '../../helpers/catch-error';

describe('Order Entity', () => {
  const address = Address.of('서울', '1', '1111');

  const createOrder = () => {
    const member = Member.create('userA', address);
    const book1 = Book.create({ name: 'JPA1 BOOK', price: 10000, stockQuantity: 10 });
    const book2 = Book.create({ name: 'JPA2 BOOK', price: 20000, stockQuantity: 10 });
    const orderItem1 = OrderItem.createOrderItem(book1, 10000, 1);
    const orderItem2 = OrderItem.createOrderItem(book2, 20000, 2);
    const delivery = Delivery.create(member.address);
    const order = Order.createOrder(member, delivery, orderItem1, orderItem2);
    return { member, book1, book2, delivery, order };
  };

  describe('createOrder', () => {
    it('주문 상태는 ORDER 이고 양방향 연관관계가 모두 설정된다', () => {
      // when
      const { member, delivery, order } = createOrder();

      // then
      expect(order.status).toBe(OrderStatus.ORDER);
      expect(order.orderDate).toBeInstanceOf(Date);
      expect(order.member).toBe(member);
      expect(order.delivery).toBe(delivery);
      expect(delivery.order).toBe(order);
      expect(order.orderItems).toHaveLength(2);
      for (const orderItem of order.orderItems) {
        expect(orderItem.order).toBe(order);
      }
    });

    it('배송지는 회원 주소를 복사하고 배송 상태는 READY 다', () => {
      // when
      const { member, delivery } = createOrder();

      // then
      expect(delivery.status).toBe(DeliveryStatus.READY);
      expect(delivery.address).toEqual(member.address);
      expect(delivery.address).not.toBe(member.address);
    });

    it('주문 수량만큼 재고가 줄어든다', () => {
      const { book1, book2 } = createOrder();

      expect(book1.stockQuantity).toBe(9);
      expect(book2.stockQuantity).toBe(8);
    });
  });

  describe('getTotalPrice', () => {
    it('주문상품 가격 * 수량의 합을 반환한다', () => {
      const { order } = createOrder();

      expect(order.getTotalPrice()).toBe(10000 * 1 + 20000 * 2);
    });
  });

  describe('cancel', () => {
    it('주문을 취소하면 상태가 CANCEL 이 되고 재고가 원복된다', () => {
      // given
      const { order, book1, book2 } = createOrder();

      // when
      order.cancel();

      // then
      expect(order.status).toBe(OrderStatus.CANCEL);
      expect(order.isCancelled()).toBe(true);
      expect(book1.stockQuantity).toBe(10);
      expect(book2.stockQuantity).toBe(10);
    });

    it('배송 완료된 주문은 ALREADY_DELIVERED 예외를 던진다', () => {
      // given
      const { order, delivery, book1 } = createOrder();
      delivery.complete();

      // when
      const error = catchError(() => order.cancel());

      // then
      expect(error).toBeInstanceOf(DomainException);
      expect(error).toMatchObject({
        errorCode: ErrorCode.ALREADY_DELIVERED,
        message: '이미 배송완료된 상품은 취소가 불가능합니다.',
      });
      expect(order.status).toBe(OrderStatus.ORDER);
      expect(book1.stockQuantity).toBe(9);
    });

    it('이미 취소된 주문은 ALREADY_CANCELLED 예외를 던지고 재고를 두 번 되돌리지 않는다', () => {
      // given
      const { order, book1 } = createOrder();
      order.cancel();

      // when
      const error = catchError(() => order.cancel());

      // then
      expect(error).toMatchObject({ errorCode: ErrorCode.ALREADY_CANCELLED });
      expect(book1.stockQuantity).toBe(10);
    });
  });
});
