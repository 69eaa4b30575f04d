import { Exclude, Type } from 'class-transformer';
import { IsNotEmpty, IsOptional, IsString, ValidateNested } from 'class-validator';
import { Column, Entity, OneToMany, PrimaryGeneratedColumn } from 'typeorm';
import { Address } from '@common/domain/address.vo';
import { Order } from '@/order/domain/entities/order.entity';

/**
 * Member Entity
 */
@Entity('member')
export class Member {
  @PrimaryGeneratedColumn({ name: 'member_id' })
  id!: number;

  // V1 API 가 엔티티를 요청 바디로 그대로 받기 때문에 검증 규칙이 엔티티에 섞여 있다
  @IsString()
  @IsNotEmpty()
  @Column({ type: 'varchar', length: 100 })
  name!: string;

  @IsOptional()
  @ValidateNested()
  @Type(() => Address)
  @Column(() => Address, { prefix: false })
  address!: Address;

  // 양방향 연관관계의 반대편. 엔티티를 직접 직렬화할 때 무한 순환을 막는다
  @Exclude()
  @OneToMany(() => Order, (order) => order.member)
  orders!: Order[];

  static create(name: string, address: Address = Address.empty()): Member {
    const member = new Member();
    member.name = name;
    member.address = address;
    return member;
  }

  /**
   * ANCHOR 이름 변경 (변경 감지 대상)
   */
  changeName(name: string): void {
    this.name = name;
  }
}
