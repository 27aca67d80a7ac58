import { collectDefaultMetrics, Counter, Gauge, Registry } from 'prom-client';

export interface MetricsBundle {
  registry: Registry;
  activeConnections: Gauge;
  commands: Counter<'type'>;
  connectionCloses: Counter<'reason'>;
}

export const createMetricsBundle = (
  options: { collectDefaults?: boolean } = {},
): MetricsBundle => {
  const registry = new Registry();
  if (options.collectDefaults ?? true) {
    collectDefaultMetrics({ register: registry });
  }

  const activeConnections = new Gauge({
    name: 'huddle_realtime_connections',
    help: 'Number of active signaling websocket connections',
    registers: [registry],
  });

  const commands = new Counter({
    name: 'huddle_commands_total',
    help: 'Count of decoded signaling commands by type',
    labelNames: ['type'] as const,
    registers: [registry],
  });

  const connectionCloses = new Counter({
    name: 'huddle_connection_closes_total',
    help: 'Count of finished signaling sessions by close reason',
    labelNames: ['reason'] as const,
    registers: [registry],
  });

  return {
    registry,
    activeConnections,
    commands,
    connectionCloses,
  };
};
