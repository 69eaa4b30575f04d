import { ApiProperty } from '@nestjs/swagger';
import { IsNotEmpty, IsString } from 'class-validator';
import {
  JoinMemberCommand,
  JoinMemberResult,
} from '@/member/application/dto/join-member.dto';
import { Member } from '@/member/domain/entities/member.entity';

/**
 * 회원 등록 요청 DTO (V2)
 */
export class CreateMemberRequest {
  @ApiProperty({ description: '회원 이름', example: 'userC' })
  @IsString()
  @IsNotEmpty()
  name!: string;

  static toCommand(dto: CreateMemberRequest): JoinMemberCommand {
    return new JoinMemberCommand(dto.name);
  }

  /**
   * V1 은 엔티티 모양의 바디를 그대로 받는다.
   */
  static fromEntityBody(member: Member): JoinMemberCommand {
    return new JoinMemberCommand(member.name, member.address);
  }
}

/**
 * 회원 등록 응답 DTO
 */
export class CreateMemberResponse {
  @ApiProperty({ description: '회원 ID' })
  id: number;

  constructor(id: number) {
    this.id = id;
  }

  static fromResult(result: JoinMemberResult): CreateMemberResponse {
    return new CreateMemberResponse(result.id);
  }
}
