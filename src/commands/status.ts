import { loadConfig } from '../config/config.js';
import { HostMetricsSource } from '../metrics/system-metrics.js';
import { CommandDispatcher } from '../relay/commands.js';

/** Print the /status report for this host. Needs no secrets. */
export async function runStatus(): Promise<void> {
  const config = await loadConfig();
  const commands = new CommandDispatcher({
    model: config.llm.model,
    metrics: new HostMetricsSource(config.metrics),
  });
  const report = await commands.dispatch('/status', { senderId: 'local', conversationId: 'cli' });
  console.log(report);
}
