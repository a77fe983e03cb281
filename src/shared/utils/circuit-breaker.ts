import { CircuitBreakerError } from '../types';
import { getLogger } from './logger';

const logger = getLogger();

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN',
}

export interface CircuitBreakerConfig {
  failureThreshold: number; // consecutive failures before opening
  successThreshold: number; // successes in HALF_OPEN before closing
  timeout: number; // ms spent OPEN before a trial call is let through
}

const DEFAULT_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  successThreshold: 2,
  timeout: 60000,
};

/**
 * Stops hammering an embedding model that keeps failing.
 *
 *   const breaker = getCircuitBreaker('bedrock-embeddings', { failureThreshold: 5 });
 *   const vector = await breaker.execute(() => invokeEmbeddingModel(...));
 */
export class CircuitBreaker {
  private readonly config: CircuitBreakerConfig;
  private state = CircuitState.CLOSED;
  private failureCount = 0;
  private successCount = 0;
  private openedUntil = 0;

  constructor(
    public readonly name: string,
    config: Partial<CircuitBreakerConfig> = {}
  ) {
    this.config = { ...DEFAULT_CONFIG, ...config };
    logger.debug('Circuit breaker initialized', { circuit_breaker: name, config: this.config });
  }

  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.state === CircuitState.OPEN) {
      if (Date.now() < this.openedUntil) {
        logger.warn('Circuit breaker is OPEN, rejecting call', {
          circuit_breaker: this.name,
          next_attempt: new Date(this.openedUntil).toISOString(),
        });
        throw new CircuitBreakerError(`Circuit breaker ${this.name} is OPEN`, this.name);
      }

      this.state = CircuitState.HALF_OPEN;
      this.successCount = 0;
      logger.info('Circuit breaker HALF_OPEN, letting a trial call through', {
        circuit_breaker: this.name,
      });
    }

    try {
      const result = await fn();
      this.recordSuccess();
      return result;
    } catch (error) {
      this.recordFailure();
      throw error;
    }
  }

  private recordSuccess(): void {
    this.failureCount = 0;
    if (this.state !== CircuitState.HALF_OPEN) return;

    this.successCount++;
    if (this.successCount >= this.config.successThreshold) {
      this.state = CircuitState.CLOSED;
      this.successCount = 0;
      logger.info('Circuit breaker CLOSED after recovery', { circuit_breaker: this.name });
    }
  }

  private recordFailure(): void {
    this.failureCount++;

    if (
      this.state === CircuitState.HALF_OPEN ||
      this.failureCount >= this.config.failureThreshold
    ) {
      this.state = CircuitState.OPEN;
      this.openedUntil = Date.now() + this.config.timeout;
      logger.error('Circuit breaker OPENED', {
        circuit_breaker: this.name,
        failure_count: this.failureCount,
        next_attempt: new Date(this.openedUntil).toISOString(),
      });
    }
  }

  getState(): { state: CircuitState; failureCount: number; successCount: number } {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
    };
  }

  reset(): void {
    this.state = CircuitState.CLOSED;
    this.failureCount = 0;
    this.successCount = 0;
    this.openedUntil = 0;
  }
}

// One breaker per downstream service
const circuitBreakers = new Map<string, CircuitBreaker>();

export function getCircuitBreaker(
  name: string,
  config?: Partial<CircuitBreakerConfig>
): CircuitBreaker {
  let breaker = circuitBreakers.get(name);
  if (!breaker) {
    breaker = new CircuitBreaker(name, config);
    circuitBreakers.set(name, breaker);
  }
  return breaker;
}
