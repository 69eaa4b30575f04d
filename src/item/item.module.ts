import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Item } from '@/item/domain/entities/item.entity';
import { Book } from '@/item/domain/entities/book.entity';
import { Album } from '@/item/domain/entities/album.entity';
import { Movie } from '@/item/domain/entities/movie.entity';
import { Category } from '@/item/domain/entities/category.entity';
import { ItemDomainService } from '@/item/domain/services/item.service';
import {
  ICategoryRepository,
  IItemRepository,
} from '@/item/domain/interfaces/item.repository.interface';
import {
  CategoryRepository,
  ItemRepository,
} from '@/item/infrastructure/item.repository';
import { RegisterItemUseCase } from '@/item/application/register-item.use-case';
import { UpdateItemUseCase } from '@/item/application/update-item.use-case';
import { GetItemsUseCase } from '@/item/application/get-items.use-case';
import { ItemController } from '@/item/presentation/item.controller';

/**
 * Item Module
 * 상품(도서/음반/영화) 및 카테고리 모듈
 */
@Module({
  imports: [TypeOrmModule.forFeature([Item, Book, Album, Movie, Category])],
  controllers: [ItemController],
  providers: [
    // Repositories
    ItemRepository,
    {
      provide: IItemRepository,
      useClass: ItemRepository,
    },
    CategoryRepository,
    {
      provide: ICategoryRepository,
      useClass: CategoryRepository,
    },

    // Domain Service
    ItemDomainService,

    // UseCases
    RegisterItemUseCase,
    UpdateItemUseCase,
    GetItemsUseCase,
  ],
  exports: [ItemDomainService, IItemRepository, ICategoryRepository],
})
export class ItemModule {}
