import { Injectable } from '@nestjs/common';
import { ItemDomainService } from '@/item/domain/services/item.service';
import { EntityRelationLoader } from '@common/typeorm-manager/entity-relation.loader';
import { ItemDetailResult, ItemResult } from './dto/item.result';

@Injectable()
export class GetItemsUseCase {
  constructor(
    private readonly itemService: ItemDomainService,
    private readonly relationLoader: EntityRelationLoader,
  ) {}

  /**
   * ANCHOR 상품 목록
   */
  async execute(): Promise<ItemResult[]> {
    const items = await this.itemService.findItems();
    return items.map((item) => ItemResult.fromDomain(item));
  }

  /**
   * ANCHOR 상품 상세
   * 카테고리는 지연 로딩 대상이라 명시적으로 초기화한다.
   */
  async detail(itemId: number): Promise<ItemDetailResult> {
    const item = await this.itemService.findOne(itemId);
    const categories = await this.relationLoader.initialize(item, 'categories');

    return new ItemDetailResult(
      ItemResult.fromDomain(item),
      categories.map((category) => category.name),
    );
  }
}
