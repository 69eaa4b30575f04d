import { Injectable } from '@nestjs/common';
import { In, Repository } from 'typeorm';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import {
  ICategoryRepository,
  IItemRepository,
} from '../domain/interfaces/item.repository.interface';
import { Item } from '@/item/domain/entities/item.entity';
import { Category } from '@/item/domain/entities/category.entity';

/**
 * Item Repository Implementation (TypeORM)
 * 단일 테이블 상속이라 Item 으로 조회해도 dtype 에 맞는 하위 타입 인스턴스가 돌아온다.
 */
@Injectable()
export class ItemRepository implements IItemRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  private get repository(): Repository<Item> {
    return this.transactionManager.getManager().getRepository(Item);
  }

  // ANCHOR save
  async save<T extends Item>(item: T): Promise<T> {
    return this.transactionManager.getManager().save(item);
  }

  // ANCHOR saveAll
  async saveAll(items: Item[]): Promise<Item[]> {
    return this.transactionManager.getManager().save(items);
  }

  // ANCHOR findById
  async findById(id: number): Promise<Item | null> {
    return this.repository.findOneBy({ id });
  }

  // ANCHOR findByIds
  async findByIds(ids: number[]): Promise<Item[]> {
    if (ids.length === 0) {
      return [];
    }
    return this.repository.find({
      where: { id: In(ids) },
      order: { id: 'ASC' },
    });
  }

  // ANCHOR findAll
  async findAll(): Promise<Item[]> {
    return this.repository.find({ order: { id: 'ASC' } });
  }
}

/**
 * Category Repository Implementation (TypeORM)
 */
@Injectable()
export class CategoryRepository implements ICategoryRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  // ANCHOR save
  async save(category: Category): Promise<Category> {
    return this.transactionManager.getManager().save(category);
  }
}
