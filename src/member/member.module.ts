import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { Member } from '@/member/domain/entities/member.entity';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { IMemberRepository } from '@/member/domain/interfaces/member.repository.interface';
import { MemberRepository } from '@/member/infrastructure/member.repository';
import { JoinMemberUseCase } from '@/member/application/join-member.use-case';
import { UpdateMemberUseCase } from '@/member/application/update-member.use-case';
import { GetMembersUseCase } from '@/member/application/get-members.use-case';
import { MemberApiController } from '@/member/presentation/member.controller';

/**
 * Member Module
 * 회원 관리 모듈
 */
@Module({
  imports: [TypeOrmModule.forFeature([Member])],
  controllers: [MemberApiController],
  providers: [
    // Repository
    MemberRepository,
    {
      provide: IMemberRepository,
      useClass: MemberRepository,
    },

    // Domain Service
    MemberDomainService,

    // UseCases
    JoinMemberUseCase,
    UpdateMemberUseCase,
    GetMembersUseCase,
  ],
  exports: [MemberDomainService, IMemberRepository],
})
export class MemberModule {}
