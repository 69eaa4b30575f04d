import { Item } from '@/item/domain/entities/item.entity';
import { Category } from '@/item/domain/entities/category.entity';

/**
 * Item Repository Port
 * 상품 데이터 접근 계약
 */
export abstract class IItemRepository {
  abstract save<T extends Item>(item: T): Promise<T>;
  abstract saveAll(items: Item[]): Promise<Item[]>;
  abstract findById(id: number): Promise<Item | null>;
  abstract findByIds(ids: number[]): Promise<Item[]>;
  abstract findAll(): Promise<Item[]>;
}

/**
 * Category Repository Port
 */
export abstract class ICategoryRepository {
  abstract save(category: Category): Promise<Category>;
}
