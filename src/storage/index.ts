import { KvStore } from './kvStore';
import { FeeRepository } from './feeRepository';
import { LiquidityRepository } from './liquidityRepository';
import { OrderRepository } from './orderRepository';
import { PositionRepository } from './positionRepository';
import { PriceRepository } from './priceRepository';

export interface Repositories {
    prices: PriceRepository;
    positions: PositionRepository;
    liquidity: LiquidityRepository;
    fees: FeeRepository;
    orders: OrderRepository;
}

export function createRepositories(store: KvStore): Repositories {
    return {
        prices: new PriceRepository(store),
        positions: new PositionRepository(store),
        liquidity: new LiquidityRepository(store),
        fees: new FeeRepository(store),
        orders: new OrderRepository(store),
    };
}

export { KvStore };
