import { Member } from '@/member/domain/entities/member.entity';

/**
 * Member Repository Port
 * 회원 데이터 접근 계약
 */
export abstract class IMemberRepository {
  abstract save(member: Member): Promise<Member>;
  abstract findById(id: number): Promise<Member | null>;
  abstract findAll(): Promise<Member[]>;
  abstract findByName(name: string): Promise<Member[]>;
}
