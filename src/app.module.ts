import { Module } from '@nestjs/common';

// GLOBAL MODULES
import { GlobalTypeOrmModule } from './@common/typeorm-manager/typeorm.module';
import { QueryMetricsModule } from './@common/metrics/metrics.module';

// APP MODULES
import { MemberModule } from './member/member.module';
import { ItemModule } from './item/item.module';
import { OrderModule } from './order/order.module';
import { SeedModule } from './@seed/seed.module';

@Module({
  imports: [
    // GLOBAL
    GlobalTypeOrmModule,
    QueryMetricsModule,

    // APP MODULES
    MemberModule,
    ItemModule,
    OrderModule,
    SeedModule,
  ],
  controllers: [],
  providers: [],
})
export class AppModule {}
