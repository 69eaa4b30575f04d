import { ApiProperty } from '@nestjs/swagger';
import { Member } from '@/member/domain/entities/member.entity';

export class MemberNameResponse {
  @ApiProperty({ description: '회원 이름' })
  name: string;

  constructor(name: string) {
    this.name = name;
  }
}

/**
 * 회원 목록 응답 DTO (V2)
 * 배열을 바로 내보내지 않고 감싸서 이후 필드 추가 여지를 남긴다.
 */
export class GetMembersResponse {
  @ApiProperty({ description: '회원 수' })
  count: number;

  @ApiProperty({ type: [MemberNameResponse] })
  data: MemberNameResponse[];

  constructor(data: MemberNameResponse[]) {
    this.count = data.length;
    this.data = data;
  }

  static fromDomain(members: Member[]): GetMembersResponse {
    return new GetMembersResponse(
      members.map((member) => new MemberNameResponse(member.name)),
    );
  }
}
