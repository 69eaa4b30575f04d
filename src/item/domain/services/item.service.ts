import { Injectable } from '@nestjs/common';
import { IItemRepository } from '@/item/domain/interfaces/item.repository.interface';
import { Item, ItemSpec } from '../entities/item.entity';
import { ErrorCode, DomainException } from '@common/exception';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import { Transactional } from '@common/typeorm-manager/transactional.decorator';

/**
 * ItemDomainService
 * 상품 등록/수정/조회 및 재고 반영
 */
@Injectable()
export class ItemDomainService {
  constructor(
    private readonly itemRepository: IItemRepository,
    private readonly transactionManager: TransactionManager,
  ) {}

  /**
   * ANCHOR 상품 저장
   */
  @Transactional()
  async saveItem<T extends Item>(item: T): Promise<T> {
    return await this.itemRepository.save(item);
  }

  /**
   * ANCHOR 상품 수정
   * 영속 상태의 엔티티를 조회해 값을 바꾼 뒤 저장한다. 요청 객체를 그대로 병합하지 않는다.
   */
  @Transactional()
  async updateItem(itemId: number, spec: ItemSpec): Promise<Item> {
    const item = await this.findOne(itemId);
    item.change(spec);
    return await this.itemRepository.save(item);
  }

  /**
   * ANCHOR 상품 전체 조회
   */
  async findItems(): Promise<Item[]> {
    return await this.itemRepository.findAll();
  }

  /**
   * ANCHOR 상품 단건 조회
   */
  async findOne(itemId: number): Promise<Item> {
    const item = await this.itemRepository.findById(itemId);
    if (!item) {
      throw new DomainException(ErrorCode.ITEM_NOT_FOUND);
    }
    return item;
  }

  /**
   * ANCHOR 재고 변경 반영
   * 주문/취소로 바뀐 재고를 저장한다. 호출 측 트랜잭션에 참여한다.
   */
  @Transactional()
  async saveStockChanges(items: Item[]): Promise<void> {
    if (items.length === 0) {
      return;
    }
    await this.itemRepository.saveAll(items);
  }
}
