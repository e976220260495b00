export * from './circuit-breaker.types';
export { HostCircuitBreaker, CircuitBreakerRegistry } from './circuit-breaker.manager';
