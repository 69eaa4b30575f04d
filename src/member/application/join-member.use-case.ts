import { Injectable } from '@nestjs/common';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { Member } from '@/member/domain/entities/member.entity';
import { JoinMemberCommand, JoinMemberResult } from './dto/join-member.dto';

@Injectable()
export class JoinMemberUseCase {
  constructor(private readonly memberService: MemberDomainService) {}

  /**
   * ANCHOR 회원 가입
   */
  async execute(cmd: JoinMemberCommand): Promise<JoinMemberResult> {
    const id = await this.memberService.join(
      Member.create(cmd.name, cmd.address),
    );

    return new JoinMemberResult(id);
  }
}
