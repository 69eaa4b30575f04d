import { TestingModule } from '@nestjs/testing';
import { QueryContext } from '@common/typeorm-manager/query-context';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';
import {
  EntityRelationLoader,
  requireInitialized,
} from '@common/typeorm-manager/entity-relation.loader';
import { ErrorCode, RepositoryException } from '@common/exception';
import { OrderDomainService } from '@/order/domain/services/order.service';
import { IOrderRepository } from '@/order/domain/interfaces/order.repository.interface';
import { OrderStatus } from '@/order/domain/entities/order-status';
import { ItemDomainService } from '@/item/domain/services/item.service';
import { MemberDomainService } from '@/member/domain/services/member.service';
import { IMemberRepository } from '@/member/domain/interfaces/member.repository.interface';
import { Member } from '@/member/domain/entities/member.entity';
import { Address } from '@common/domain/address.vo';
import { setupIntegrationModule } from './setup';

describe('OrderDomainService (Integration)', () => {
  let moduleRef: TestingModule;
  let orderService: OrderDomainService;
  let itemService: ItemDomainService;
  let orderRepository: IOrderRepository;

  beforeAll(async () => {
    moduleRef = await setupIntegrationModule();
    orderService = moduleRef.get(OrderDomainService);
    itemService = moduleRef.get(ItemDomainService);
    orderRepository = moduleRef.get(IOrderRepository);
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('주문하면 재고가 줄고, 취소하면 재고와 상태가 되돌아간다', async () => {
    // given: JPA1 BOOK (id 1) 재고 99
    const before = await itemService.findOne(1);
    expect(before.stockQuantity).toBe(99);

    // when
    const orderId = await orderService.order(2, 1, 5);

    // then
    expect((await itemService.findOne(1)).stockQuantity).toBe(94);
    const saved = await orderRepository.findByIdWithDeliveryAndItems(orderId);
    expect(saved?.status).toBe(OrderStatus.ORDER);
    expect(saved?.delivery.address.city).toBe('부산');
    expect(saved?.orderItems.map((orderItem) => orderItem.orderPrice)).toEqual([10000]);

    // when
    const cancelled = await orderService.cancelOrder(orderId);

    // then
    expect(cancelled.status).toBe(OrderStatus.CANCEL);
    expect((await itemService.findOne(1)).stockQuantity).toBe(99);
    expect((await orderService.getOrder(orderId)).status).toBe(OrderStatus.CANCEL);
  });

  it('이미 취소된 주문을 다시 취소하면 ALREADY_CANCELLED 예외를 던지고 재고는 그대로다', async () => {
    // given
    const orderId = await orderService.order(1, 2, 1);
    await orderService.cancelOrder(orderId);

    // when & then
    await expect(orderService.cancelOrder(orderId)).rejects.toMatchObject({
      errorCode: ErrorCode.ALREADY_CANCELLED,
    });
    expect((await itemService.findOne(2)).stockQuantity).toBe(98);
  });

  it('재고가 부족하면 주문이 저장되지 않는다', async () => {
    await expect(orderService.order(1, 3, 1000)).rejects.toMatchObject({
      errorCode: ErrorCode.NOT_ENOUGH_STOCK,
    });

    expect((await itemService.findOne(3)).stockQuantity).toBe(197);
  });

  describe('findOrders', () => {
    it('회원 이름 부분 일치와 주문 상태로 검색하고 주문 ID 오름차순으로 돌려준다', async () => {
      const byName = await orderService.findOrders({ memberName: 'B' });
      const ordered = await orderService.findOrders({
        memberName: 'user',
        orderStatus: OrderStatus.ORDER,
      });
      const cancelled = await orderService.findOrders({
        orderStatus: OrderStatus.CANCEL,
      });

      // 주문 3 은 첫 번째 테스트에서 userB 가 주문한 뒤 취소했다
      expect(byName.map((order) => order.id)).toEqual([2, 3]);
      expect(ordered.map((order) => order.id)).toEqual([1, 2]);
      expect(cancelled.map((order) => order.id)).toEqual([3, 4]);
    });

    it('검색 결과는 회원을 로딩하지 않는다', async () => {
      const [order] = await orderService.findOrders({});

      expect(() => requireInitialized(order, 'member')).toThrow(RepositoryException);
    });
  });
});

describe('동시 주문 (Integration)', () => {
  let moduleRef: TestingModule;
  let orderService: OrderDomainService;
  let itemService: ItemDomainService;

  beforeAll(async () => {
    moduleRef = await setupIntegrationModule();
    orderService = moduleRef.get(OrderDomainService);
    itemService = moduleRef.get(ItemDomainService);
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('동시에 들어온 주문은 서로의 트랜잭션을 방해하지 않는다', async () => {
    // given: JPA1 BOOK (id 1) 재고 99, JPA2 BOOK (id 2) 재고 98

    // when: 재고 부족으로 실패하는 주문과 정상 주문이 겹친다
    const [failed, placed] = await Promise.allSettled([
      orderService.placeOrder(1, [
        { itemId: 2, count: 1 },
        { itemId: 3, count: 100000 },
      ]),
      orderService.placeOrder(2, [{ itemId: 1, count: 1 }]),
    ]);

    // then
    expect(failed).toMatchObject({
      status: 'rejected',
      reason: { errorCode: ErrorCode.NOT_ENOUGH_STOCK },
    });
    expect(placed).toEqual({ status: 'fulfilled', value: 3 });
    expect((await itemService.findOne(1)).stockQuantity).toBe(98);
    expect((await itemService.findOne(2)).stockQuantity).toBe(98);
  });

  it('여러 주문을 한꺼번에 넣어도 모두 저장된다', async () => {
    const orderIds = await Promise.all([
      orderService.order(1, 4, 1),
      orderService.order(2, 4, 1),
      orderService.order(1, 4, 1),
    ]);

    expect([...orderIds].sort()).toEqual([4, 5, 6]);
    expect((await itemService.findOne(4)).stockQuantity).toBe(293);
  });
});

describe('TransactionManager (Integration)', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    moduleRef = await setupIntegrationModule({ seed: false });
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('트랜잭션 안에서 예외가 나면 저장한 내용이 롤백된다', async () => {
    // given
    const transactionManager = moduleRef.get(TransactionManager);
    const memberRepository = moduleRef.get(IMemberRepository);

    // when
    await expect(
      transactionManager.runInTransaction(async () => {
        await memberRepository.save(Member.create('rollback', Address.empty()));
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');

    // then
    await expect(memberRepository.findByName('rollback')).resolves.toEqual([]);
  });

  it('중첩 호출은 바깥 트랜잭션에 참여한다', async () => {
    const transactionManager = moduleRef.get(TransactionManager);
    const memberService = moduleRef.get(MemberDomainService);

    await expect(
      transactionManager.runInTransaction(async () => {
        await memberService.join(Member.create('nested', Address.empty()));
        expect(transactionManager.isTransactionActive()).toBe(true);
        throw new Error('outer failed');
      }),
    ).rejects.toThrow('outer failed');

    await expect(memberService.findMembers()).resolves.toEqual([]);
  });

  it('같은 이름으로 가입하면 DUPLICATE_MEMBER 예외를 던진다', async () => {
    const memberService = moduleRef.get(MemberDomainService);
    await memberService.join(Member.create('dup', Address.empty()));

    await expect(
      memberService.join(Member.create('dup', Address.empty())),
    ).rejects.toMatchObject({ errorCode: ErrorCode.DUPLICATE_MEMBER });
  });
});

describe('EntityRelationLoader (Integration)', () => {
  let moduleRef: TestingModule;

  beforeAll(async () => {
    moduleRef = await setupIntegrationModule();
  });

  afterAll(async () => {
    await moduleRef.close();
  });

  it('fetch join 으로 채워진 연관관계는 쿼리 없이 돌려준다', async () => {
    const orderRepository = moduleRef.get(IOrderRepository);
    const relationLoader = moduleRef.get(EntityRelationLoader);
    const [order] = await orderRepository.findAllWithMemberDelivery();

    const { result, queryCount } = await QueryContext.measure(() =>
      relationLoader.initialize(order, 'member'),
    );

    expect(queryCount).toBe(0);
    expect(result.name).toBe('userA');
  });

  it('로딩되지 않은 연관관계는 쿼리 1 번으로 초기화한다', async () => {
    const orderRepository = moduleRef.get(IOrderRepository);
    const relationLoader = moduleRef.get(EntityRelationLoader);
    const order = await orderRepository.findById(1);
    if (!order) {
      throw new Error('seed order not found');
    }

    const { result, queryCount } = await QueryContext.measure(() =>
      relationLoader.initialize(order, 'orderItems'),
    );

    expect(queryCount).toBe(1);
    expect(result.map((orderItem) => orderItem.count)).toEqual([1, 2]);
    expect(requireInitialized(order, 'orderItems')).toBe(result);
  });
});
