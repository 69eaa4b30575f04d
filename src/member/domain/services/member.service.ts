import { Injectable } from '@nestjs/common';
import { IMemberRepository } from '@/member/domain/interfaces/member.repository.interface';
import { Member } from '../entities/member.entity';
import { ErrorCode, DomainException } from '@common/exception';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import { Transactional } from '@common/typeorm-manager/transactional.decorator';

/**
 * MemberDomainService
 * 회원 가입/수정/조회 비즈니스 로직
 */
@Injectable()
export class MemberDomainService {
  constructor(
    private readonly memberRepository: IMemberRepository,
    private readonly transactionManager: TransactionManager,
  ) {}

  /**
   * ANCHOR 회원 가입
   */
  @Transactional()
  async join(member: Member): Promise<number> {
    await this.validateDuplicateMember(member);
    const saved = await this.memberRepository.save(member);
    return saved.id;
  }

  private async validateDuplicateMember(member: Member): Promise<void> {
    const findMembers = await this.memberRepository.findByName(member.name);
    if (findMembers.length > 0) {
      throw new DomainException(ErrorCode.DUPLICATE_MEMBER);
    }
  }

  /**
   * ANCHOR 회원 전체 조회
   */
  async findMembers(): Promise<Member[]> {
    return await this.memberRepository.findAll();
  }

  /**
   * ANCHOR 회원 단건 조회
   */
  async findOne(memberId: number): Promise<Member> {
    const member = await this.memberRepository.findById(memberId);
    if (!member) {
      throw new DomainException(ErrorCode.MEMBER_NOT_FOUND);
    }
    return member;
  }

  /**
   * ANCHOR 회원 이름 수정
   * 수정 결과는 반환하지 않는다 (커맨드와 쿼리 분리). 필요하면 findOne 으로 다시 조회한다.
   */
  @Transactional()
  async update(memberId: number, name: string): Promise<void> {
    const member = await this.findOne(memberId);
    member.changeName(name);
    await this.memberRepository.save(member);
  }
}
