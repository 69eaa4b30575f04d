import { OrderStatus } from './order-status';

/**
 * 주문 검색 조건
 * 값이 없는 조건은 쿼리에서 제외된다.
 */
export interface OrderSearch {
  memberName?: string;
  orderStatus?: OrderStatus;
}

export const ORDER_SEARCH_MAX_RESULTS = 1000;
