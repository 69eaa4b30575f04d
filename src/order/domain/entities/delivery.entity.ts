import { Exclude } from 'class-transformer';
import { Column, Entity, OneToOne, PrimaryGeneratedColumn } from 'typeorm';
import { Address } from '@common/domain/address.vo';
import { DeliveryStatus } from './order-status';
import { Order } from './order.entity';

/**
 * Delivery Entity
 */
@Entity('delivery')
export class Delivery {
  @PrimaryGeneratedColumn({ name: 'delivery_id' })
  id!: number;

  @Exclude()
  @OneToOne(() => Order, (order) => order.delivery)
  order!: Order;

  @Column(() => Address, { prefix: false })
  address!: Address;

  @Column({ type: 'varchar', length: 10 })
  status!: DeliveryStatus;

  static create(address: Address): Delivery {
    const delivery = new Delivery();
    delivery.address = Address.from(address);
    delivery.status = DeliveryStatus.READY;
    return delivery;
  }

  /**
   * ANCHOR 배송 완료 처리
   */
  complete(): void {
    this.status = DeliveryStatus.COMP;
  }

  isCompleted(): boolean {
    return this.status === DeliveryStatus.COMP;
  }
}
