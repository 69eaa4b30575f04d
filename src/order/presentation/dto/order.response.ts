import { ApiProperty } from '@nestjs/swagger';
import {
  AddressResult,
  OrderItemResult,
  OrderResult,
  SimpleOrderResult,
} from '@/order/application/dto/order.result';
import { OrderStatus } from '@/order/domain/entities/order-status';

export class AddressResponse {
  @ApiProperty({ nullable: true, type: String })
  city: string | null;

  @ApiProperty({ nullable: true, type: String })
  street: string | null;

  @ApiProperty({ nullable: true, type: String })
  zipcode: string | null;

  constructor(result: AddressResult) {
    this.city = result.city;
    this.street = result.street;
    this.zipcode = result.zipcode;
  }
}

/**
 * 주문 요약 응답 DTO (회원 이름, 배송지)
 */
export class SimpleOrderResponse {
  @ApiProperty({ description: '주문 ID' })
  orderId: number;

  @ApiProperty({ description: '회원 이름' })
  name: string;

  @ApiProperty({ description: '주문 일시' })
  orderDate: Date;

  @ApiProperty({ description: '주문 상태', enum: ['ORDER', 'CANCEL'] })
  orderStatus: OrderStatus;

  @ApiProperty({ description: '배송지', type: AddressResponse })
  address: AddressResponse;

  constructor(result: SimpleOrderResult) {
    this.orderId = result.orderId;
    this.name = result.name;
    this.orderDate = result.orderDate;
    this.orderStatus = result.orderStatus;
    this.address = new AddressResponse(result.address);
  }

  static fromResult(result: SimpleOrderResult): SimpleOrderResponse {
    return new SimpleOrderResponse(result);
  }
}

export class OrderItemResponse {
  @ApiProperty({ description: '상품명' })
  itemName: string;

  @ApiProperty({ description: '주문 가격' })
  orderPrice: number;

  @ApiProperty({ description: '주문 수량' })
  count: number;

  constructor(result: OrderItemResult) {
    this.itemName = result.itemName;
    this.orderPrice = result.orderPrice;
    this.count = result.count;
  }
}

/**
 * 주문 응답 DTO (주문상품 포함)
 */
export class OrderResponse extends SimpleOrderResponse {
  @ApiProperty({ type: [OrderItemResponse] })
  orderItems: OrderItemResponse[];

  constructor(result: OrderResult) {
    super(result);
    this.orderItems = result.orderItems.map(
      (orderItem) => new OrderItemResponse(orderItem),
    );
  }

  static fromOrderResult(result: OrderResult): OrderResponse {
    return new OrderResponse(result);
  }
}
