import { Injectable } from '@nestjs/common';
import { ItemDomainService } from '@/item/domain/services/item.service';
import { UpdateItemCommand } from './dto/register-item.dto';
import { ItemResult } from './dto/item.result';

@Injectable()
export class UpdateItemUseCase {
  constructor(private readonly itemService: ItemDomainService) {}

  /**
   * ANCHOR 상품 수정
   */
  async execute(cmd: UpdateItemCommand): Promise<ItemResult> {
    const item = await this.itemService.updateItem(cmd.itemId, cmd.spec);
    return ItemResult.fromDomain(item);
  }
}
