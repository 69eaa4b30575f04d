import { Injectable } from '@nestjs/common';
import { Repository } from 'typeorm';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import { IMemberRepository } from '../domain/interfaces/member.repository.interface';
import { Member } from '@/member/domain/entities/member.entity';

/**
 * Member Repository Implementation (TypeORM)
 */
@Injectable()
export class MemberRepository implements IMemberRepository {
  constructor(private readonly transactionManager: TransactionManager) {}

  private get repository(): Repository<Member> {
    return this.transactionManager.getManager().getRepository(Member);
  }

  // ANCHOR save
  async save(member: Member): Promise<Member> {
    return this.repository.save(member);
  }

  // ANCHOR findById
  async findById(id: number): Promise<Member | null> {
    return this.repository.findOneBy({ id });
  }

  // ANCHOR findAll
  async findAll(): Promise<Member[]> {
    return this.repository.find({ order: { id: 'ASC' } });
  }

  // ANCHOR findByName
  async findByName(name: string): Promise<Member[]> {
    return this.repository.findBy({ name });
  }
}
