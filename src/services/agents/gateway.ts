/**
 * @file src/services/agents/gateway.ts
 * @description Uniform call contract for every remote agent role
 * @context invoke() never throws: each call site receives a tagged outcome and
 *          decides whether the fault aborts the run or is absorbed
 */

import {
  ClarifyingQuestions,
  DeliveryConfirmation,
  DeliveryRequest,
  Report,
  SearchPlan,
} from '../../types/research';
import { AIProviderError, DeliveryProviderError, MalformedOutputError } from '../../types/errors';

export interface AgentInputs {
  clarifier: string;
  planner: string;
  searcher: string;
  writer: string;
  delivery: DeliveryRequest;
}

export interface AgentOutputs {
  clarifier: ClarifyingQuestions;
  planner: SearchPlan;
  searcher: string;
  writer: Report;
  delivery: DeliveryConfirmation;
}

export type AgentRole = keyof AgentInputs;

export type AgentFaultKind = 'provider' | 'malformed_output' | 'cancelled' | 'unexpected';

export interface AgentFault {
  role: AgentRole;
  kind: AgentFaultKind;
  message: string;
}

export type AgentOutcome<T> = { ok: true; value: T } | { ok: false; fault: AgentFault };

export interface AgentCallContext {
  requestId?: string;
  signal?: AbortSignal;
}

export interface AgentGateway {
  invoke<R extends AgentRole>(
    role: R,
    input: AgentInputs[R],
    context?: AgentCallContext
  ): Promise<AgentOutcome<AgentOutputs[R]>>;
}

export type AgentHandlers = {
  [R in AgentRole]: (input: AgentInputs[R], context: AgentCallContext) => Promise<AgentOutputs[R]>;
};

function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export function toAgentFault(role: AgentRole, error: unknown): AgentFault {
  if (isAbortError(error)) {
    return { role, kind: 'cancelled', message: 'Call was cancelled' };
  }
  if (error instanceof MalformedOutputError) {
    return { role, kind: 'malformed_output', message: error.message };
  }
  if (error instanceof AIProviderError || error instanceof DeliveryProviderError) {
    return { role, kind: 'provider', message: error.message };
  }
  return {
    role,
    kind: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
  };
}

/**
 * Gateway over a table of throwing handlers; converts every thrown error into a fault
 */
export class HandlerAgentGateway implements AgentGateway {
  constructor(private readonly handlers: AgentHandlers) {}

  async invoke<R extends AgentRole>(
    role: R,
    input: AgentInputs[R],
    context: AgentCallContext = {}
  ): Promise<AgentOutcome<AgentOutputs[R]>> {
    if (context.signal?.aborted) {
      return { ok: false, fault: { role, kind: 'cancelled', message: 'Call was cancelled' } };
    }

    const handler = this.handlers[role];

    try {
      const value = await handler(input, context);
      return { ok: true, value };
    } catch (error) {
      return { ok: false, fault: toAgentFault(role, error) };
    }
  }
}
