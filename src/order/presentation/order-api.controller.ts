import {
  ClassSerializerInterceptor,
  Controller,
  Get,
  Query,
  UseInterceptors,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { OrderQueryFacade } from '@/order/application/order-query.facade';
import { Order } from '@/order/domain/entities/order.entity';
import { OrderResponse } from './dto/order.response';
import { OrderPageRequest } from './dto/order-command.dto';

/**
 * 주문 조회 API (컬렉션: Order -> OrderItem -> Item)
 */
@ApiTags('Orders (with items)')
@Controller('api')
export class OrderApiController {
  constructor(private readonly orderQueryFacade: OrderQueryFacade) {}

  /**
   * ANCHOR V1: 엔티티 직접 노출 (반면교사)
   */
  @Get('v1/orders')
  @UseInterceptors(ClassSerializerInterceptor)
  @ApiOperation({ summary: 'V1 엔티티 직접 노출' })
  async ordersV1(): Promise<Order[]> {
    return await this.orderQueryFacade.ordersV1();
  }

  /**
   * ANCHOR V2: 엔티티 → DTO
   */
  @Get('v2/orders')
  @ApiOperation({ summary: 'V2 엔티티 → DTO (지연 로딩)' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV2(): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV2();
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }

  /**
   * ANCHOR V3: 컬렉션 fetch join
   */
  @Get('v3/orders')
  @ApiOperation({ summary: 'V3 컬렉션 fetch join (페이징 불가)' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV3(): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV3();
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }

  /**
   * ANCHOR V3.1: to-one fetch join + 페이징 + 배치 로딩
   */
  @Get('v3.1/orders')
  @ApiOperation({ summary: 'V3.1 페이징 + 배치 로딩' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV3Page(@Query() page: OrderPageRequest): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV3Page(
      page.offset,
      page.limit,
    );
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }

  /**
   * ANCHOR V4: DTO 직접 조회 (1 + N)
   */
  @Get('v4/orders')
  @ApiOperation({ summary: 'V4 DTO 직접 조회' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV4(): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV4();
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }

  /**
   * ANCHOR V5: DTO 직접 조회 + IN 절 최적화
   */
  @Get('v5/orders')
  @ApiOperation({ summary: 'V5 DTO 조회 + 컬렉션 IN 조회' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV5(): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV5();
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }

  /**
   * ANCHOR V6: 평면 조회 1번
   */
  @Get('v6/orders')
  @ApiOperation({ summary: 'V6 평면 DTO 조회 후 메모리 그룹핑' })
  @ApiResponse({ status: 200, type: [OrderResponse] })
  async ordersV6(): Promise<OrderResponse[]> {
    const results = await this.orderQueryFacade.ordersV6();
    return results.map((result) => OrderResponse.fromOrderResult(result));
  }
}
