import {
  ClassSerializerInterceptor,
  Controller,
  Get,
  UseInterceptors,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { SimpleOrderQueryFacade } from '@/order/application/simple-order-query.facade';
import { Order } from '@/order/domain/entities/order.entity';
import { SimpleOrderResponse } from './dto/order.response';

/**
 * 주문 조회 API (xToOne: Order -> Member, Order -> Delivery)
 */
@ApiTags('Simple Orders')
@Controller('api')
export class OrderSimpleApiController {
  constructor(private readonly simpleOrderQueryFacade: SimpleOrderQueryFacade) {}

  /**
   * ANCHOR V1: 엔티티 직접 노출 (반면교사)
   */
  @Get('v1/simple-orders')
  @UseInterceptors(ClassSerializerInterceptor)
  @ApiOperation({ summary: 'V1 엔티티 직접 노출' })
  async ordersV1(): Promise<Order[]> {
    return await this.simpleOrderQueryFacade.ordersV1();
  }

  /**
   * ANCHOR V2: 엔티티를 DTO 로 변환
   */
  @Get('v2/simple-orders')
  @ApiOperation({ summary: 'V2 엔티티 → DTO (지연 로딩)' })
  @ApiResponse({ status: 200, type: [SimpleOrderResponse] })
  async ordersV2(): Promise<SimpleOrderResponse[]> {
    const results = await this.simpleOrderQueryFacade.ordersV2();
    return results.map((result) => SimpleOrderResponse.fromResult(result));
  }

  /**
   * ANCHOR V3: fetch join
   */
  @Get('v3/simple-orders')
  @ApiOperation({ summary: 'V3 fetch join → DTO' })
  @ApiResponse({ status: 200, type: [SimpleOrderResponse] })
  async ordersV3(): Promise<SimpleOrderResponse[]> {
    const results = await this.simpleOrderQueryFacade.ordersV3();
    return results.map((result) => SimpleOrderResponse.fromResult(result));
  }

  /**
   * ANCHOR V4: DTO 직접 조회
   */
  @Get('v4/simple-orders')
  @ApiOperation({ summary: 'V4 조회 전용 DTO 직접 조회' })
  @ApiResponse({ status: 200, type: [SimpleOrderResponse] })
  async ordersV4(): Promise<SimpleOrderResponse[]> {
    const results = await this.simpleOrderQueryFacade.ordersV4();
    return results.map((result) => SimpleOrderResponse.fromResult(result));
  }
}
