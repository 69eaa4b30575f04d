import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { Type } from 'class-transformer';
import { IsInt, IsOptional, IsString, Max, Min } from 'class-validator';
import {
  CancelOrderResult,
  OrderSummaryResult,
  PlaceOrderCommand,
  PlaceOrderResult,
  SearchOrdersQuery,
} from '@/order/application/dto/order-command.dto';
import {
  OrderStatus,
  parseOrderStatus,
} from '@/order/domain/entities/order-status';

/**
 * 주문 생성 요청 DTO
 */
export class PlaceOrderRequest {
  @ApiProperty({ description: '회원 ID', example: 1 })
  @IsInt()
  @Min(1)
  memberId!: number;

  @ApiProperty({ description: '상품 ID', example: 1 })
  @IsInt()
  @Min(1)
  itemId!: number;

  @ApiProperty({ description: '주문 수량', example: 1, minimum: 1 })
  @IsInt()
  @Min(1, { message: '주문 수량은 1 이상이어야 합니다' })
  count!: number;

  static toCommand(dto: PlaceOrderRequest): PlaceOrderCommand {
    return new PlaceOrderCommand(dto.memberId, dto.itemId, dto.count);
  }
}

/**
 * 주문 생성 응답 DTO
 */
export class PlaceOrderResponse {
  @ApiProperty({ description: '주문 ID' })
  orderId: number;

  constructor(orderId: number) {
    this.orderId = orderId;
  }

  static fromResult(result: PlaceOrderResult): PlaceOrderResponse {
    return new PlaceOrderResponse(result.orderId);
  }
}

/**
 * 주문 취소 응답 DTO
 */
export class CancelOrderResponse {
  @ApiProperty({ description: '주문 ID' })
  orderId: number;

  @ApiProperty({ description: '주문 상태', enum: ['ORDER', 'CANCEL'] })
  status: OrderStatus;

  constructor(orderId: number, status: OrderStatus) {
    this.orderId = orderId;
    this.status = status;
  }

  static fromResult(result: CancelOrderResult): CancelOrderResponse {
    return new CancelOrderResponse(result.orderId, result.status);
  }
}

/**
 * 주문 검색 요청 DTO (쿼리스트링)
 */
export class SearchOrdersRequest {
  @ApiPropertyOptional({ description: '회원 이름 (부분 일치)' })
  @IsOptional()
  @IsString()
  memberName?: string;

  @ApiPropertyOptional({ description: '주문 상태', enum: ['ORDER', 'CANCEL'] })
  @IsOptional()
  @IsString()
  orderStatus?: string;

  static toQuery(dto: SearchOrdersRequest): SearchOrdersQuery {
    return new SearchOrdersQuery(
      dto.memberName || undefined,
      dto.orderStatus ? parseOrderStatus(dto.orderStatus) : undefined,
    );
  }
}

/**
 * 주문 검색 응답 DTO
 */
export class OrderSummaryResponse {
  @ApiProperty({ description: '주문 ID' })
  orderId: number;

  @ApiProperty({ description: '회원 이름' })
  memberName: string;

  @ApiProperty({ description: '주문 상태', enum: ['ORDER', 'CANCEL'] })
  orderStatus: OrderStatus;

  @ApiProperty({ description: '주문 일시' })
  orderDate: Date;

  @ApiProperty({ description: '주문 총액' })
  totalPrice: number;

  constructor(result: OrderSummaryResult) {
    this.orderId = result.orderId;
    this.memberName = result.memberName;
    this.orderStatus = result.orderStatus;
    this.orderDate = result.orderDate;
    this.totalPrice = result.totalPrice;
  }

  static fromResult(result: OrderSummaryResult): OrderSummaryResponse {
    return new OrderSummaryResponse(result);
  }
}

/**
 * 페이징 요청 DTO (V3.1)
 */
export class OrderPageRequest {
  @ApiPropertyOptional({ description: '시작 위치', default: 0, minimum: 0 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(0)
  offset: number = 0;

  @ApiPropertyOptional({ description: '조회 개수', default: 100, minimum: 1 })
  @IsOptional()
  @Type(() => Number)
  @IsInt()
  @Min(1)
  @Max(1000)
  limit: number = 100;
}
