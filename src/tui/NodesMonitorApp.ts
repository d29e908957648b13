import blessed from 'blessed';
import { AggregatorClient } from '../lib/aggregator-client';
import { NodeStatus, displayName } from '../types/node-status';
import { GpuTelemetry } from '../types/telemetry';
import { formatAge, formatBytes, formatPower, progressBar, truncate } from '../utils/format-utils';

export interface DashboardState {
  nodes: NodeStatus[];
  error: string | null;
  lastUpdated: Date | null;
  updateInterval: number;
}

const STATE_COLORS: Record<NodeStatus['status'], string> = {
  online: 'green',
  offline: 'red',
  unknown: 'yellow',
};

// Aggregator errors are free text; keep blessed from reading {...} as tags
function escapeTags(text: string): string {
  return text.replace(/[{}]/g, (ch) => (ch === '{' ? '{open}' : '{close}'));
}

function renderGpu(gpu: GpuTelemetry, index: number): string {
  const memoryPercent = gpu.memory_total > 0 ? (gpu.memory_used / gpu.memory_total) * 100 : 0;

  let content = `  {bold}GPU ${index}{/bold} ${escapeTags(truncate(gpu.name, 28))}\n`;
  content += `    Util:   {cyan-fg}${progressBar(gpu.utilization, 20)}{/cyan-fg} ${Math.round(gpu.utilization)}%`;
  content += `  ${gpu.temperature}°C  ${formatPower(gpu.power_usage)} / ${formatPower(gpu.power_limit)}\n`;
  content += `    Memory: {cyan-fg}${progressBar(memoryPercent, 20)}{/cyan-fg} `;
  content += `${formatBytes(gpu.memory_used)} / ${formatBytes(gpu.memory_total)}\n`;

  for (const process of gpu.processes) {
    const owner = process.user ? ` (${escapeTags(process.user)})` : '';
    content += `    {gray-fg}${process.pid} ${escapeTags(truncate(process.name, 32))}${owner} ${formatBytes(process.used)}{/gray-fg}\n`;
  }

  return content;
}

function renderNode(node: NodeStatus, now: number): string {
  const color = STATE_COLORS[node.status];
  let content = `{${color}-fg}●{/${color}-fg} {bold}${escapeTags(displayName(node))}{/bold}`;
  content += `  ${node.host}:${node.port}  {gray-fg}${node.status}, updated ${formatAge(node.last_update, now)}{/gray-fg}\n`;

  if (node.status === 'online') {
    if (node.data.gpus.length === 0) {
      content += '  {gray-fg}No GPUs reported{/gray-fg}\n';
    }
    node.data.gpus.forEach((gpu, index) => {
      content += renderGpu(gpu, index);
    });
  } else if (node.status === 'offline') {
    content += `  {red-fg}${escapeTags(node.error)}{/red-fg}\n`;
  } else {
    content += '  {gray-fg}Waiting for first poll...{/gray-fg}\n';
  }

  return content;
}

/**
 * Full dashboard content (blessed tag markup)
 */
export function renderDashboard(state: DashboardState, width: number = 80, now: number = Date.now()): string {
  const online = state.nodes.filter((node) => node.status === 'online').length;
  const offline = state.nodes.filter((node) => node.status === 'offline').length;
  const divider = '─'.repeat(Math.max(width - 2, 10));

  let content = '{bold}GPU Nodes{/bold}  ';
  content += `{gray-fg}${state.nodes.length} nodes · ${online} online · ${offline} offline`;
  if (state.lastUpdated) {
    content += ` · updated ${state.lastUpdated.toLocaleTimeString()}`;
  }
  content += ` · every ${state.updateInterval / 1000}s{/gray-fg}\n`;
  content += divider + '\n';

  if (state.error) {
    content += `{red-fg}⚠ ${escapeTags(state.error)}{/red-fg}\n\n`;
  }

  if (state.nodes.length === 0 && !state.error) {
    content += '{gray-fg}Connecting to aggregator...{/gray-fg}\n';
  }

  for (const node of state.nodes) {
    content += renderNode(node, now) + '\n';
  }

  content += divider + '\n';
  content += '{gray-fg}[R] Refresh  [Q] Quit{/gray-fg}';
  return content;
}

export async function createNodesMonitorUI(
  screen: blessed.Widgets.Screen,
  client: AggregatorClient,
  updateInterval: number = 2000
): Promise<void> {
  const state: DashboardState = { nodes: [], error: null, lastUpdated: null, updateInterval };
  let intervalId: NodeJS.Timeout | null = null;
  let isLoading = false;

  // Single scrollable content box
  const contentBox = blessed.box({
    top: 0,
    left: 0,
    width: '100%',
    height: '100%',
    tags: true,
    scrollable: true,
    alwaysScroll: true,
    keys: true,
    vi: true,
    mouse: true,
    scrollbar: {
      ch: '█',
      style: {
        fg: 'blue',
      },
    },
  });
  screen.append(contentBox);

  function render(): void {
    const width = typeof screen.width === 'number' ? screen.width : 80;
    contentBox.setContent(renderDashboard(state, width));
    screen.render();
  }

  // Never rejects: failures are shown in the dashboard
  async function refresh(): Promise<void> {
    if (isLoading) return;
    isLoading = true;

    try {
      state.nodes = await client.listNodes();
      state.error = null;
      state.lastUpdated = new Date();
    } catch (error) {
      state.error = (error as Error).message;
    } finally {
      isLoading = false;
    }

    render();
  }

  screen.key(['q', 'Q', 'C-c'], () => {
    if (intervalId) clearInterval(intervalId);
    screen.destroy();
    process.exit(0);
  });

  screen.key(['r', 'R'], () => {
    void refresh();
  });

  contentBox.focus();
  render();
  await refresh();

  intervalId = setInterval(() => {
    void refresh();
  }, updateInterval);
}
