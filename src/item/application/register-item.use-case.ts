import { Injectable } from '@nestjs/common';
import { ItemDomainService } from '@/item/domain/services/item.service';
import { Album } from '@/item/domain/entities/album.entity';
import { Book } from '@/item/domain/entities/book.entity';
import { Item } from '@/item/domain/entities/item.entity';
import { Movie } from '@/item/domain/entities/movie.entity';
import { RegisterItemCommand, RegisterItemResult } from './dto/register-item.dto';

@Injectable()
export class RegisterItemUseCase {
  constructor(private readonly itemService: ItemDomainService) {}

  /**
   * ANCHOR 상품 등록 (도서/음반/영화)
   */
  async execute(cmd: RegisterItemCommand): Promise<RegisterItemResult> {
    const saved = await this.itemService.saveItem(this.toItem(cmd));
    return new RegisterItemResult(saved.id);
  }

  private toItem(cmd: RegisterItemCommand): Item {
    switch (cmd.type) {
      case 'B':
        return Book.create(cmd);
      case 'A':
        return Album.create(cmd);
      case 'M':
        return Movie.create(cmd);
    }
  }
}
