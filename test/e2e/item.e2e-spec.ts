import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './app.factory';

describe('ItemController (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/items/*', () => {
    it('도서를 등록한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/items/books')
        .send({ name: 'JPA3 BOOK', price: 15000, stockQuantity: 50, author: 'kim', isbn: '978' })
        .expect(201);

      expect(response.body).toEqual({ id: 5 });
    });

    it('음반과 영화를 등록한다', async () => {
      await request(app.getHttpServer())
        .post('/api/items/albums')
        .send({ name: 'album', price: 12000, stockQuantity: 5, artist: 'band' })
        .expect(201);
      await request(app.getHttpServer())
        .post('/api/items/movies')
        .send({ name: 'movie', price: 9000, stockQuantity: 3, director: 'lee' })
        .expect(201);
    });

    it('가격이 음수이면 400을 반환한다', async () => {
      await request(app.getHttpServer())
        .post('/api/items/books')
        .send({ name: 'bad', price: -1, stockQuantity: 1 })
        .expect(400);
    });
  });

  describe('GET /api/items', () => {
    it('전체 상품을 ID 순으로 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/items')
        .expect(200);

      expect(response.body).toHaveLength(7);
      expect(response.body[5]).toEqual({
        id: 6,
        itemType: 'A',
        name: 'album',
        price: 12000,
        stockQuantity: 5,
        attributes: { artist: 'band', etc: null },
      });
      expect(response.body[6].itemType).toBe('M');
    });
  });

  describe('GET /api/items/:itemId', () => {
    it('상품과 카테고리 이름을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/items/1')
        .expect(200);

      expect(response.body).toEqual({
        id: 1,
        itemType: 'B',
        name: 'JPA1 BOOK',
        price: 10000,
        stockQuantity: 99,
        attributes: { author: null, isbn: null },
        categories: ['IT'],
      });
    });

    it('없는 상품이면 404와 I001 을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/items/999')
        .expect(404);

      expect(response.body.errorCode).toBe('I001');
    });
  });

  describe('PUT /api/items/:itemId', () => {
    it('상품 정보를 수정한다', async () => {
      const response = await request(app.getHttpServer())
        .put('/api/items/5')
        .send({ name: 'JPA3 BOOK', price: 16000, stockQuantity: 40 })
        .expect(200);

      expect(response.body).toEqual({
        id: 5,
        itemType: 'B',
        name: 'JPA3 BOOK',
        price: 16000,
        stockQuantity: 40,
        attributes: { author: 'kim', isbn: '978' },
      });
    });
  });
});
