import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { MemberModule } from '@/member/member.module';
import { ItemModule } from '@/item/item.module';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderItem } from '@/order/domain/entities/order-item.entity';
import { Delivery } from '@/order/domain/entities/delivery.entity';
import { OrderDomainService } from '@/order/domain/services/order.service';
import {
  IOrderItemRepository,
  IOrderRepository,
} from '@/order/domain/interfaces/order.repository.interface';
import {
  IOrderQueryRepository,
  IOrderSimpleQueryRepository,
} from '@/order/domain/interfaces/order-query.repository.interface';
import {
  OrderItemRepository,
  OrderRepository,
} from '@/order/infrastructure/order.repository';
import {
  OrderQueryRepository,
  OrderSimpleQueryRepository,
} from '@/order/infrastructure/order-query.repository';
import { PlaceOrderUseCase } from '@/order/application/place-order.use-case';
import { CancelOrderUseCase } from '@/order/application/cancel-order.use-case';
import { SearchOrdersUseCase } from '@/order/application/search-orders.use-case';
import { SimpleOrderQueryFacade } from '@/order/application/simple-order-query.facade';
import { OrderQueryFacade } from '@/order/application/order-query.facade';
import { OrderController } from '@/order/presentation/order.controller';
import { OrderSimpleApiController } from '@/order/presentation/order-simple-api.controller';
import { OrderApiController } from '@/order/presentation/order-api.controller';

/**
 * Order Module
 * 주문 생성/취소/검색과 주문 조회 API (V1 ~ V6)
 */
@Module({
  imports: [
    TypeOrmModule.forFeature([Order, OrderItem, Delivery]),
    MemberModule,
    ItemModule,
  ],
  controllers: [OrderController, OrderSimpleApiController, OrderApiController],
  providers: [
    // Repositories
    OrderRepository,
    {
      provide: IOrderRepository,
      useClass: OrderRepository,
    },
    OrderItemRepository,
    {
      provide: IOrderItemRepository,
      useClass: OrderItemRepository,
    },

    // Query Repositories (화면 전용 DTO 조회)
    {
      provide: IOrderSimpleQueryRepository,
      useClass: OrderSimpleQueryRepository,
    },
    {
      provide: IOrderQueryRepository,
      useClass: OrderQueryRepository,
    },

    // Domain Service
    OrderDomainService,

    // UseCases / Facades
    PlaceOrderUseCase,
    CancelOrderUseCase,
    SearchOrdersUseCase,
    SimpleOrderQueryFacade,
    OrderQueryFacade,
  ],
  exports: [OrderDomainService, IOrderRepository],
})
export class OrderModule {}
