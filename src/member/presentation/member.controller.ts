import {
  Body,
  ClassSerializerInterceptor,
  Controller,
  Get,
  Param,
  ParseIntPipe,
  Post,
  Put,
  UseInterceptors,
} from '@nestjs/common';
import { ApiOperation, ApiParam, ApiResponse, ApiTags } from '@nestjs/swagger';

// DTOs
import {
  CreateMemberRequest,
  CreateMemberResponse,
} from './dto/create-member.dto';
import {
  UpdateMemberRequest,
  UpdateMemberResponse,
} from './dto/update-member.dto';
import { GetMembersResponse } from './dto/get-members.dto';

// Use Cases
import { JoinMemberUseCase } from '@/member/application/join-member.use-case';
import { UpdateMemberUseCase } from '@/member/application/update-member.use-case';
import { GetMembersUseCase } from '@/member/application/get-members.use-case';

import { Member } from '@/member/domain/entities/member.entity';

/**
 * Member API Controller
 * v1 은 엔티티를 그대로 주고받는 반면교사, v2 는 DTO 를 사용한다.
 */
@ApiTags('Members')
@Controller('api')
export class MemberApiController {
  constructor(
    private readonly joinMemberUseCase: JoinMemberUseCase,
    private readonly updateMemberUseCase: UpdateMemberUseCase,
    private readonly getMembersUseCase: GetMembersUseCase,
  ) {}

  /**
   * ANCHOR 회원 등록 v1: 엔티티를 요청 바디로 직접 받음
   */
  @Post('v1/members')
  @ApiOperation({ summary: '회원 등록 v1 (엔티티 바디)' })
  @ApiResponse({ status: 201, type: CreateMemberResponse })
  @ApiResponse({ status: 409, description: '중복 회원' })
  async saveMemberV1(@Body() member: Member): Promise<CreateMemberResponse> {
    const result = await this.joinMemberUseCase.execute(
      CreateMemberRequest.fromEntityBody(member),
    );
    return CreateMemberResponse.fromResult(result);
  }

  /**
   * ANCHOR 회원 등록 v2
   */
  @Post('v2/members')
  @ApiOperation({ summary: '회원 등록 v2' })
  @ApiResponse({ status: 201, type: CreateMemberResponse })
  @ApiResponse({ status: 409, description: '중복 회원' })
  async saveMemberV2(
    @Body() dto: CreateMemberRequest,
  ): Promise<CreateMemberResponse> {
    const result = await this.joinMemberUseCase.execute(
      CreateMemberRequest.toCommand(dto),
    );
    return CreateMemberResponse.fromResult(result);
  }

  /**
   * ANCHOR 회원 수정 v2
   */
  @Put('v2/members/:id')
  @ApiOperation({ summary: '회원 이름 수정' })
  @ApiParam({ name: 'id', description: '회원 ID' })
  @ApiResponse({ status: 200, type: UpdateMemberResponse })
  @ApiResponse({ status: 404, description: '회원을 찾을 수 없음' })
  async updateMemberV2(
    @Param('id', ParseIntPipe) id: number,
    @Body() dto: UpdateMemberRequest,
  ): Promise<UpdateMemberResponse> {
    const result = await this.updateMemberUseCase.execute(
      UpdateMemberRequest.toCommand(id, dto),
    );
    return UpdateMemberResponse.fromResult(result);
  }

  /**
   * ANCHOR 회원 목록 v1: 엔티티 직렬화 (orders 는 @Exclude)
   */
  @Get('v1/members')
  @UseInterceptors(ClassSerializerInterceptor)
  @ApiOperation({ summary: '회원 목록 v1 (엔티티 노출)' })
  async membersV1(): Promise<Member[]> {
    return await this.getMembersUseCase.execute();
  }

  /**
   * ANCHOR 회원 목록 v2
   */
  @Get('v2/members')
  @ApiOperation({ summary: '회원 목록 v2' })
  @ApiResponse({ status: 200, type: GetMembersResponse })
  async membersV2(): Promise<GetMembersResponse> {
    const members = await this.getMembersUseCase.execute();
    return GetMembersResponse.fromDomain(members);
  }
}
