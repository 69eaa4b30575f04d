import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { CancelOrderResult } from './dto/order-command.dto';

@Injectable()
export class CancelOrderUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 주문 취소
   */
  async execute(orderId: number): Promise<CancelOrderResult> {
    const order = await this.orderService.cancelOrder(orderId);
    return CancelOrderResult.fromDomain(order);
  }
}
