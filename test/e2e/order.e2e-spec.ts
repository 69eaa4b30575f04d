import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './app.factory';

describe('OrderController (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/orders', () => {
    it('주문을 생성하고 재고를 차감한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders')
        .send({ memberId: 1, itemId: 1, count: 2 })
        .expect(201);

      expect(response.body).toEqual({ orderId: 3 });

      const item = await request(app.getHttpServer()).get('/api/items/1').expect(200);
      expect(item.body.stockQuantity).toBe(97);
    });

    it('수량이 1 미만이면 400을 반환한다', async () => {
      await request(app.getHttpServer())
        .post('/api/orders')
        .send({ memberId: 1, itemId: 1, count: 0 })
        .expect(400);
    });

    it('재고가 부족하면 400과 I002 를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders')
        .send({ memberId: 1, itemId: 1, count: 1000 })
        .expect(400);

      expect(response.body.errorCode).toBe('I002');
      expect(response.body.message).toBe('need more stock');
    });

    it('없는 회원이면 404를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders')
        .send({ memberId: 999, itemId: 1, count: 1 })
        .expect(404);

      expect(response.body.errorCode).toBe('M001');
    });
  });

  describe('GET /api/orders', () => {
    it('회원 이름으로 검색한 주문 요약을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/orders')
        .query({ memberName: 'userA' })
        .expect(200);

      expect(response.body).toHaveLength(2);
      expect(response.body[0]).toMatchObject({
        orderId: 1,
        memberName: 'userA',
        orderStatus: 'ORDER',
        totalPrice: 50000,
      });
      expect(response.body[1]).toMatchObject({ orderId: 3, totalPrice: 20000 });
    });

    it('알 수 없는 주문 상태면 400과 O005 를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/orders')
        .query({ orderStatus: 'SHIPPED' })
        .expect(400);

      expect(response.body.errorCode).toBe('O005');
    });
  });

  describe('POST /api/orders/:orderId/cancel', () => {
    it('주문을 취소하고 재고를 되돌린다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders/3/cancel')
        .expect(200);

      expect(response.body).toEqual({ orderId: 3, status: 'CANCEL' });

      const item = await request(app.getHttpServer()).get('/api/items/1').expect(200);
      expect(item.body.stockQuantity).toBe(99);
    });

    it('취소된 주문은 상태로 검색된다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/orders')
        .query({ orderStatus: 'cancel' })
        .expect(200);

      expect(response.body.map((order: { orderId: number }) => order.orderId)).toEqual([3]);
    });

    it('이미 취소된 주문이면 400과 O003 을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders/3/cancel')
        .expect(400);

      expect(response.body.errorCode).toBe('O003');
    });

    it('없는 주문이면 404를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/orders/999/cancel')
        .expect(404);

      expect(response.body.errorCode).toBe('O001');
    });
  });
});
