/**
 * @file src/metrics.ts
 * @description Prometheus metrics, registered once per process on the default registry.
 */

import { register, Counter, Gauge } from 'prom-client';

export const sessionResolutionCounter = new Counter({
  name: 'mcp_session_resolutions_total',
  help: 'Application session lookups by find-or-create outcome',
  labelNames: ['outcome'] as const,
});

export const recoveryCounter = new Counter({
  name: 'mcp_session_recoveries_total',
  help: 'Transport recovery attempts by result',
  labelNames: ['result'] as const,
});

export const localTransportsGauge = new Gauge({
  name: 'mcp_local_transports',
  help: 'Transports bound in this process',
});

export const toolCallCounter = new Counter({
  name: 'mcp_tool_calls_total',
  help: 'Tool invocations by tool name',
  labelNames: ['tool'] as const,
});

export { register as metricsRegister };
