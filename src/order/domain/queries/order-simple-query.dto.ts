import { Address } from '@common/domain/address.vo';
import { OrderStatus } from '../entities/order-status';

/**
 * 주문 + 회원 + 배송 정보를 select 절에서 바로 조회한 결과
 * (엔티티를 거치지 않는 조회 전용 DTO)
 */
export class OrderSimpleQueryDto {
  constructor(
    public readonly orderId: number,
    public readonly name: string,
    public readonly orderDate: Date,
    public readonly orderStatus: OrderStatus,
    public readonly address: Address,
  ) {}
}
