import { DiscoveryService, Reflector } from '@nestjs/core';
import { WorkflowRegistry } from '../src/services/workflow-registry.service';
import type { IAuditSink } from '../src/interfaces/audit-sink.interface';
import type { ResolvedWorkflowOptions } from '../src/interfaces/workflow-module-options.interface';

export const FIXED_NOW = new Date('2026-01-15T10:00:00.000Z');

export function fixedClock(): Date {
  return new Date(FIXED_NOW.getTime());
}

export function createMockRegistry(
  options?: Partial<ResolvedWorkflowOptions>,
): WorkflowRegistry {
  const mockDiscovery = {
    getProviders: () => [],
  } as unknown as DiscoveryService;
  const mockReflector = { get: () => undefined } as unknown as Reflector;
  return new WorkflowRegistry(mockDiscovery, mockReflector, {
    workflows: [],
    serializeByEntity: true,
    now: fixedClock,
    ...options,
  });
}

export function createMockAuditSink(): jest.Mocked<IAuditSink> {
  return {
    record: jest.fn().mockResolvedValue(undefined),
  };
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
