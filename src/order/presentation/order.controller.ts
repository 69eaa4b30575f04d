import {
  Body,
  Controller,
  Get,
  HttpCode,
  Param,
  ParseIntPipe,
  Post,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

// DTOs
import {
  CancelOrderResponse,
  OrderSummaryResponse,
  PlaceOrderRequest,
  PlaceOrderResponse,
  SearchOrdersRequest,
} from './dto/order-command.dto';

// Use Cases
import { PlaceOrderUseCase } from '@/order/application/place-order.use-case';
import { CancelOrderUseCase } from '@/order/application/cancel-order.use-case';
import { SearchOrdersUseCase } from '@/order/application/search-orders.use-case';

/**
 * Order Controller
 * 주문 생성/취소/검색 API 엔드포인트
 */
@ApiTags('Orders')
@Controller('api/orders')
export class OrderController {
  constructor(
    private readonly placeOrderUseCase: PlaceOrderUseCase,
    private readonly cancelOrderUseCase: CancelOrderUseCase,
    private readonly searchOrdersUseCase: SearchOrdersUseCase,
  ) {}

  /**
   * ANCHOR 주문 생성
   */
  @Post()
  @ApiOperation({
    summary: '주문 생성',
    description: '회원이 상품 하나를 주문합니다. 재고가 차감됩니다.',
  })
  @ApiResponse({ status: 201, type: PlaceOrderResponse })
  @ApiResponse({ status: 400, description: '재고 부족 또는 잘못된 수량' })
  @ApiResponse({ status: 404, description: '회원 또는 상품을 찾을 수 없음' })
  async placeOrder(@Body() dto: PlaceOrderRequest): Promise<PlaceOrderResponse> {
    const result = await this.placeOrderUseCase.execute(
      PlaceOrderRequest.toCommand(dto),
    );
    return PlaceOrderResponse.fromResult(result);
  }

  /**
   * ANCHOR 주문 검색
   */
  @Get()
  @ApiOperation({ summary: '주문 검색', description: '회원 이름, 주문 상태로 검색합니다.' })
  @ApiResponse({ status: 200, type: [OrderSummaryResponse] })
  async searchOrders(
    @Query() dto: SearchOrdersRequest,
  ): Promise<OrderSummaryResponse[]> {
    const results = await this.searchOrdersUseCase.execute(
      SearchOrdersRequest.toQuery(dto),
    );
    return results.map((result) => OrderSummaryResponse.fromResult(result));
  }

  /**
   * ANCHOR 주문 취소
   */
  @Post(':orderId/cancel')
  @HttpCode(200)
  @ApiOperation({ summary: '주문 취소', description: '재고를 되돌립니다.' })
  @ApiParam({ name: 'orderId', description: '주문 ID' })
  @ApiResponse({ status: 200, type: CancelOrderResponse })
  @ApiResponse({ status: 400, description: '배송 완료 또는 이미 취소된 주문' })
  @ApiResponse({ status: 404, description: '주문을 찾을 수 없음' })
  async cancelOrder(
    @Param('orderId', ParseIntPipe) orderId: number,
  ): Promise<CancelOrderResponse> {
    const result = await this.cancelOrderUseCase.execute(orderId);
    return CancelOrderResponse.fromResult(result);
  }
}
