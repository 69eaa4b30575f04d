import { Album } from '@/item/domain/entities/album.entity';
import { Book } from '@/item/domain/entities/book.entity';
import { Item, ItemType } from '@/item/domain/entities/item.entity';
import { Movie } from '@/item/domain/entities/movie.entity';

/**
 * 하위 타입별 추가 속성
 */
export type ItemAttributes = Record<string, string | null>;

/**
 * 애플리케이션 레이어 DTO: 상품 정보
 */
export class ItemResult {
  constructor(
    public readonly id: number,
    public readonly itemType: ItemType,
    public readonly name: string,
    public readonly price: number,
    public readonly stockQuantity: number,
    public readonly attributes: ItemAttributes,
  ) {}

  static fromDomain(item: Item): ItemResult {
    return new ItemResult(
      item.id,
      item.itemType,
      item.name,
      item.price,
      item.stockQuantity,
      ItemResult.attributesOf(item),
    );
  }

  private static attributesOf(item: Item): ItemAttributes {
    if (item instanceof Book) {
      return { author: item.author, isbn: item.isbn };
    }
    if (item instanceof Album) {
      return { artist: item.artist, etc: item.etc };
    }
    if (item instanceof Movie) {
      return { director: item.director, actor: item.actor };
    }
    return {};
  }
}

/**
 * 애플리케이션 레이어 DTO: 상품 상세 (카테고리 포함)
 */
export class ItemDetailResult {
  constructor(
    public readonly item: ItemResult,
    public readonly categoryNames: string[],
  ) {}
}
