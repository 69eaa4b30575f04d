import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger';
import { IsInt, IsNotEmpty, IsOptional, IsString, Min } from 'class-validator';
import {
  RegisterItemCommand,
  RegisterItemResult,
  UpdateItemCommand,
} from '@/item/application/dto/register-item.dto';

/**
 * 상품 공통 요청 필드
 */
export class ItemRequest {
  @ApiProperty({ description: '상품명', example: 'JPA3 BOOK' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  @ApiProperty({ description: '가격', example: 15000, minimum: 0 })
  @IsInt()
  @Min(0, { message: '가격은 0 이상이어야 합니다' })
  price!: number;

  @ApiProperty({ description: '재고 수량', example: 50, minimum: 0 })
  @IsInt()
  @Min(0, { message: '재고 수량은 0 이상이어야 합니다' })
  stockQuantity!: number;
}

export class RegisterBookRequest extends ItemRequest {
  @ApiPropertyOptional({ description: '저자' })
  @IsOptional()
  @IsString()
  author?: string;

  @ApiPropertyOptional({ description: 'ISBN' })
  @IsOptional()
  @IsString()
  isbn?: string;

  static toCommand(dto: RegisterBookRequest): RegisterItemCommand {
    return { type: 'B', ...specOf(dto), author: dto.author, isbn: dto.isbn };
  }
}

export class RegisterAlbumRequest extends ItemRequest {
  @ApiPropertyOptional({ description: '아티스트' })
  @IsOptional()
  @IsString()
  artist?: string;

  @ApiPropertyOptional({ description: '기타' })
  @IsOptional()
  @IsString()
  etc?: string;

  static toCommand(dto: RegisterAlbumRequest): RegisterItemCommand {
    return { type: 'A', ...specOf(dto), artist: dto.artist, etc: dto.etc };
  }
}

export class RegisterMovieRequest extends ItemRequest {
  @ApiPropertyOptional({ description: '감독' })
  @IsOptional()
  @IsString()
  director?: string;

  @ApiPropertyOptional({ description: '배우' })
  @IsOptional()
  @IsString()
  actor?: string;

  static toCommand(dto: RegisterMovieRequest): RegisterItemCommand {
    return {
      type: 'M',
      ...specOf(dto),
      director: dto.director,
      actor: dto.actor,
    };
  }
}

/**
 * 상품 수정 요청 DTO
 */
export class UpdateItemRequest extends ItemRequest {
  static toCommand(itemId: number, dto: UpdateItemRequest): UpdateItemCommand {
    return new UpdateItemCommand(itemId, specOf(dto));
  }
}

function specOf(dto: ItemRequest) {
  return { name: dto.name, price: dto.price, stockQuantity: dto.stockQuantity };
}

/**
 * 상품 등록 응답 DTO
 */
export class RegisterItemResponse {
  @ApiProperty({ description: '상품 ID' })
  id: number;

  constructor(id: number) {
    this.id = id;
  }

  static fromResult(result: RegisterItemResult): RegisterItemResponse {
    return new RegisterItemResponse(result.id);
  }
}
