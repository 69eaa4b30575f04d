import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import {
  UpdateMemberCommand,
  UpdateMemberResult,
} from '@/member/application/dto/update-member.dto';

/**
 * 회원 수정 요청 DTO
 */
export class UpdateMemberRequest {
  @ApiProperty({ description: '변경할 이름', example: 'userA2' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  static toCommand(memberId: number, dto: UpdateMemberRequest): UpdateMemberCommand {
    return new UpdateMemberCommand(memberId, dto.name);
  }
}

/**
 * 회원 수정 응답 DTO
 */
export class UpdateMemberResponse {
  @ApiProperty({ description: '회원 ID' })
  id: number;

  @ApiProperty({ description: '회원 이름' })
  name: string;

  constructor(id: number, name: string) {
    this.id = id;
    this.name = name;
  }

  static fromResult(result: UpdateMemberResult): UpdateMemberResponse {
    return new UpdateMemberResponse(result.id, result.name);
  }
}
