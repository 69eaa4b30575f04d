import { Injectable } from '@nestjs/common';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { UpdateMemberCommand, UpdateMemberResult } from './dto/update-member.dto';

@Injectable()
export class UpdateMemberUseCase {
  constructor(private readonly memberService: MemberDomainService) {}

  /**
   * ANCHOR 회원 수정
   * 수정(커맨드) 후 별도로 다시 조회(쿼리)한다.
   */
  async execute(cmd: UpdateMemberCommand): Promise<UpdateMemberResult> {
    await this.memberService.update(cmd.memberId, cmd.name);
    const member = await this.memberService.findOne(cmd.memberId);

    return UpdateMemberResult.fromDomain(member);
  }
}
