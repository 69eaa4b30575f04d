import { Test, TestingModule } from '@nestjs/testing';
import { GlobalTypeOrmModule } from '@common/typeorm-manager/typeorm.module';
import { BatchFetchSettings } from '@common/typeorm-manager/batch-loader.factory';
import { MemberModule } from '@/member/member.module';
import { ItemModule } from '@/item/item.module';
import { OrderModule } from '@/order/order.module';
import { SeedModule } from '@/@seed/seed.module';
import { InitDbService } from '@/@seed/init-db.service';

export interface IntegrationOptions {
  batchFetchSize?: number;
  seed?: boolean;
}

/**
 * 인메모리 SQLite 위에 전체 도메인 모듈을 올린다.
 * 테스트 모듈마다 새 데이터베이스가 만들어진다.
 */
export async function setupIntegrationModule(
  options: IntegrationOptions = {},
): Promise<TestingModule> {
  delete process.env.DATABASE_URL;

  let builder = Test.createTestingModule({
    imports: [GlobalTypeOrmModule, MemberModule, ItemModule, OrderModule, SeedModule],
  });
  if (options.batchFetchSize !== undefined) {
    builder = builder
      .overrideProvider(BatchFetchSettings)
      .useValue(new BatchFetchSettings(options.batchFetchSize));
  }

  const moduleRef = await builder.compile();

  if (options.seed ?? true) {
    await moduleRef.get(InitDbService).seed();
  }
  return moduleRef;
}
