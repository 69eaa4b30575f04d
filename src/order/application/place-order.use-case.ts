import { Injectable } from '@nestjs/common';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { PlaceOrderCommand, PlaceOrderResult } from './dto/order-command.dto';

@Injectable()
export class PlaceOrderUseCase {
  constructor(private readonly orderService: OrderDomainService) {}

  /**
   * ANCHOR 주문 생성
   */
  async execute(cmd: PlaceOrderCommand): Promise<PlaceOrderResult> {
    const orderId = await this.orderService.order(
      cmd.memberId,
      cmd.itemId,
      cmd.count,
    );
    return new PlaceOrderResult(orderId);
  }
}
