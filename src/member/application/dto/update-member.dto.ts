import { Member } from '@/member/domain/entities/member.entity';

/**
 * 애플리케이션 레이어 DTO: UpdateMember 요청
 */
export class UpdateMemberCommand {
  constructor(
    public readonly memberId: number,
    public readonly name: string,
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: UpdateMember 응답
 */
export class UpdateMemberResult {
  constructor(
    public readonly id: number,
    public readonly name: string,
  ) {}

  static fromDomain(member: Member): UpdateMemberResult {
    return new UpdateMemberResult(member.id, member.name);
  }
}
