import { DataSource } from 'typeorm';
import { TransactionManager } from '@common/typeorm-manager/transaction.manager';

/**
 * 연결하지 않은 DataSource 위의 TransactionManager
 * runInTransaction 은 핸들러를 바로 실행하고 호출 여부만 기록한다.
 */
export function createTransactionManagerStub(): TransactionManager {
  const transactionManager = new TransactionManager(
    new DataSource({ type: 'sqljs' }),
  );
  jest
    .spyOn(transactionManager, 'runInTransaction')
    .mockImplementation((handler) => handler(transactionManager.getManager()));
  return transactionManager;
}
