import {
  Body,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

// DTOs
import {
  RegisterAlbumRequest,
  RegisterBookRequest,
  RegisterItemResponse,
  RegisterMovieRequest,
  UpdateItemRequest,
} from './dto/register-item.dto';
import { ItemDetailResponse, ItemResponse } from './dto/item.response';

// Use Cases
import { RegisterItemUseCase } from '@/item/application/register-item.use-case';
import { UpdateItemUseCase } from '@/item/application/update-item.use-case';
import { GetItemsUseCase } from '@/item/application/get-items.use-case';

/**
 * Item Controller
 * 상품 등록/수정/조회 API
 */
@ApiTags('Items')
@Controller('api/items')
export class ItemController {
  constructor(
    private readonly registerItemUseCase: RegisterItemUseCase,
    private readonly updateItemUseCase: UpdateItemUseCase,
    private readonly getItemsUseCase: GetItemsUseCase,
  ) {}

  /**
   * ANCHOR 도서 등록
   */
  @Post('books')
  @ApiOperation({ summary: '도서 등록' })
  @ApiResponse({ status: 201, type: RegisterItemResponse })
  @ApiResponse({ status: 400, description: '잘못된 요청' })
  async registerBook(
    @Body() dto: RegisterBookRequest,
  ): Promise<RegisterItemResponse> {
    const result = await this.registerItemUseCase.execute(
      RegisterBookRequest.toCommand(dto),
    );
    return RegisterItemResponse.fromResult(result);
  }

  /**
   * ANCHOR 음반 등록
   */
  @Post('albums')
  @ApiOperation({ summary: '음반 등록' })
  @ApiResponse({ status: 201, type: RegisterItemResponse })
  async registerAlbum(
    @Body() dto: RegisterAlbumRequest,
  ): Promise<RegisterItemResponse> {
    const result = await this.registerItemUseCase.execute(
      RegisterAlbumRequest.toCommand(dto),
    );
    return RegisterItemResponse.fromResult(result);
  }

  /**
   * ANCHOR 영화 등록
   */
  @Post('movies')
  @ApiOperation({ summary: '영화 등록' })
  @ApiResponse({ status: 201, type: RegisterItemResponse })
  async registerMovie(
    @Body() dto: RegisterMovieRequest,
  ): Promise<RegisterItemResponse> {
    const result = await this.registerItemUseCase.execute(
      RegisterMovieRequest.toCommand(dto),
    );
    return RegisterItemResponse.fromResult(result);
  }

  /**
   * ANCHOR 상품 목록
   */
  @Get()
  @ApiOperation({ summary: '상품 목록' })
  @ApiResponse({ status: 200, type: [ItemResponse] })
  async items(): Promise<ItemResponse[]> {
    const results = await this.getItemsUseCase.execute();
    return results.map((result) => ItemResponse.fromResult(result));
  }

  /**
   * ANCHOR 상품 상세
   */
  @Get(':itemId')
  @ApiOperation({ summary: '상품 상세 (카테고리 포함)' })
  @ApiParam({ name: 'itemId', description: '상품 ID' })
  @ApiResponse({ status: 200, type: ItemDetailResponse })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async item(
    @Param('itemId', ParseIntPipe) itemId: number,
  ): Promise<ItemDetailResponse> {
    const result = await this.getItemsUseCase.detail(itemId);
    return ItemDetailResponse.fromDetail(result);
  }

  /**
   * ANCHOR 상품 수정
   */
  @Put(':itemId')
  @ApiOperation({ summary: '상품 수정' })
  @ApiParam({ name: 'itemId', description: '상품 ID' })
  @ApiResponse({ status: 200, type: ItemResponse })
  @ApiResponse({ status: 404, description: '상품을 찾을 수 없음' })
  async updateItem(
    @Param('itemId', ParseIntPipe) itemId: number,
    @Body() dto: UpdateItemRequest,
  ): Promise<ItemResponse> {
    const result = await this.updateItemUseCase.execute(
      UpdateItemRequest.toCommand(itemId, dto),
    );
    return ItemResponse.fromResult(result);
  }
}
