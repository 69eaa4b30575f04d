import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication, ValidationPipe } from '@nestjs/common';
import { AppModule } from '../../src/app.module';
import { createExceptionFilters } from '@common/exception/exception-filters';

/**
 * 샘플 데이터가 들어간 인메모리 SQLite 로 전체 애플리케이션을 띄운다.
 * main.ts 와 같은 전역 파이프/필터를 등록한다.
 */
export async function createTestApp(): Promise<INestApplication> {
  delete process.env.DATABASE_URL;
  process.env.SEED_DATA = 'true';

  const moduleFixture: TestingModule = await Test.createTestingModule({
    imports: [AppModule],
  }).compile();

  const app = moduleFixture.createNestApplication();

  // 글로벌 파이프 및 필터 설정
  app.useGlobalPipes(
    new ValidationPipe({
      transform: true,
      whitelist: true,
      forbidNonWhitelisted: true,
    }),
  );
  app.useGlobalFilters(...createExceptionFilters());

  await app.init();
  return app;
}
