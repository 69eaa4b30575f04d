import { Address } from '@common/domain/address.vo';

/**
 * 애플리케이션 레이어 DTO: JoinMember 요청
 */
export class JoinMemberCommand {
  constructor(
    public readonly name: string,
    public readonly address: Address = Address.empty(),
  ) {}
}

/**
 * 애플리케이션 레이어 DTO: JoinMember 응답
 */
export class JoinMemberResult {
  constructor(public readonly id: number) {}
}
