import { ApiProperty } from '@nestjs/swagger';
import {
  ItemAttributes,
  ItemDetailResult,
  ItemResult,
} from '@/item/application/dto/item.result';
import { ItemType } from '@/item/domain/entities/item.entity';

/**
 * 상품 응답 DTO
 */
export class ItemResponse {
  @ApiProperty({ description: '상품 ID' })
  id: number;

  @ApiProperty({ description: '상품 구분 (B: 도서, A: 음반, M: 영화)', enum: ['B', 'A', 'M'] })
  itemType: ItemType;

  @ApiProperty({ description: '상품명' })
  name: string;

  @ApiProperty({ description: '가격' })
  price: number;

  @ApiProperty({ description: '재고 수량' })
  stockQuantity: number;

  @ApiProperty({ description: '하위 타입별 속성', example: { author: 'kim', isbn: null } })
  attributes: ItemAttributes;

  constructor(result: ItemResult) {
    this.id = result.id;
    this.itemType = result.itemType;
    this.name = result.name;
    this.price = result.price;
    this.stockQuantity = result.stockQuantity;
    this.attributes = result.attributes;
  }

  static fromResult(result: ItemResult): ItemResponse {
    return new ItemResponse(result);
  }
}

/**
 * 상품 상세 응답 DTO
 */
export class ItemDetailResponse extends ItemResponse {
  @ApiProperty({ description: '카테고리 이름 목록', type: [String] })
  categories: string[];

  constructor(result: ItemDetailResult) {
    super(result.item);
    this.categories = result.categoryNames;
  }

  static fromDetail(result: ItemDetailResult): ItemDetailResponse {
    return new ItemDetailResponse(result);
  }
}
