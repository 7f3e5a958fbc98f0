import { Injectable } from '@nestjs/common';
import { ParameterStorePort } from '../../src/application/ports/output/parameter-store.port';

/**
 * In-Memory Parameter Store Adapter
 * Mirrors GetParameters: unknown names are left out of the result
 */
@Injectable()
export class InMemoryParameterStoreAdapter implements ParameterStorePort {
  private parameters: Map<string, string> = new Map();
  private failure: Error | null = null;
  private requests: string[][] = [];
  private pending: Array<() => void> = [];
  private holdResponses = false;

  async getParameters(names: string[]): Promise<Record<string, string>> {
    this.requests.push([...names]);

    if (this.holdResponses) {
      await new Promise<void>((resolve) => this.pending.push(resolve));
    }

    if (this.failure) {
      throw this.failure;
    }

    const values: Record<string, string> = {};
    for (const name of names) {
      const value = this.parameters.get(name);
      if (value !== undefined) {
        values[name] = value;
      }
    }
    return values;
  }

  // Test helper methods

  setParameter(name: string, value: string): void {
    this.parameters.set(name, value);
  }

  deleteParameter(name: string): void {
    this.parameters.delete(name);
  }

  failWith(error: Error | null): void {
    this.failure = error;
  }

  /**
   * Hold every response until `release()` is called
   */
  hold(): void {
    this.holdResponses = true;
  }

  release(): void {
    this.holdResponses = false;
    const pending = this.pending;
    this.pending = [];
    pending.forEach((resolve) => resolve());
  }

  getRequestCount(): number {
    return this.requests.length;
  }

  getLastRequest(): string[] | null {
    return this.requests.length > 0 ? this.requests[this.requests.length - 1] : null;
  }

  clear(): void {
    this.parameters.clear();
    this.failure = null;
    this.requests = [];
    this.release();
  }
}
