import { Injectable } from '@nestjs/common';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { Member } from '@/member/domain/entities/member.entity';

@Injectable()
export class GetMembersUseCase {
  constructor(private readonly memberService: MemberDomainService) {}

  /**
   * ANCHOR 회원 목록 조회
   * 엔티티를 그대로 돌려준다. 응답 형태로의 변환은 API 버전마다 다르다.
   */
  async execute(): Promise<Member[]> {
    return await this.memberService.findMembers();
  }
}
