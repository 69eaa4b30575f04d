import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { createTestApp } from './app.factory';

describe('MemberApiController (E2E)', () => {
  let app: INestApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('POST /api/v1/members', () => {
    it('엔티티 모양의 바디로 회원을 등록한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v1/members')
        .send({ name: 'userC', address: { city: '대전', street: '3', zipcode: '3333' } })
        .expect(201);

      expect(response.body).toEqual({ id: 3 });
    });

    it('이름이 없으면 400을 반환한다', async () => {
      await request(app.getHttpServer())
        .post('/api/v1/members')
        .send({ address: { city: '대전' } })
        .expect(400);
    });
  });

  describe('POST /api/v2/members', () => {
    it('이름만으로 회원을 등록한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v2/members')
        .send({ name: 'userD' })
        .expect(201);

      expect(response.body).toEqual({ id: 4 });
    });

    it('중복된 이름이면 409와 M002 를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .post('/api/v2/members')
        .send({ name: 'userA' })
        .expect(409);

      expect(response.body.errorCode).toBe('M002');
      expect(response.body.message).toBe('이미 존재하는 회원입니다.');
    });

    it('정의되지 않은 필드가 있으면 400을 반환한다', async () => {
      await request(app.getHttpServer())
        .post('/api/v2/members')
        .send({ name: 'userE', age: 20 })
        .expect(400);
    });
  });

  describe('PUT /api/v2/members/:id', () => {
    it('이름을 수정하고 수정된 회원을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .put('/api/v2/members/4')
        .send({ name: 'userD2' })
        .expect(200);

      expect(response.body).toEqual({ id: 4, name: 'userD2' });
    });

    it('없는 회원이면 404를 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .put('/api/v2/members/999')
        .send({ name: 'nobody' })
        .expect(404);

      expect(response.body.errorCode).toBe('M001');
    });
  });

  describe('GET /api/v1/members', () => {
    it('엔티티를 그대로 직렬화한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/v1/members')
        .expect(200);

      expect(response.body[0]).toEqual({
        id: 1,
        name: 'userA',
        address: { city: '서울', street: '1', zipcode: '1111' },
      });
      expect(response.body[3]).toEqual({
        id: 4,
        name: 'userD2',
        address: { city: null, street: null, zipcode: null },
      });
    });
  });

  describe('GET /api/v2/members', () => {
    it('count 와 data 로 감싼 이름 목록을 반환한다', async () => {
      const response = await request(app.getHttpServer())
        .get('/api/v2/members')
        .expect(200);

      expect(response.body).toEqual({
        count: 4,
        data: [
          { name: 'userA' },
          { name: 'userB' },
          { name: 'userC' },
          { name: 'userD2' },
        ],
      });
    });
  });
});
