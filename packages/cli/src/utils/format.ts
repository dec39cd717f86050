import { PORTS, positionName } from '@hubcast/types';
import type { ConnectedSwitch, ConnectedTrain } from '@hubcast/control';

export function formatTrain(train: ConnectedTrain): string {
  const status = train.status
    ? `${train.status.speedPercent}% ${train.status.direction}${train.status.running ? '' : ' (stopped)'}`
    : 'no status';
  const flags = [train.selfDrive ? 'self-drive' : '', train.active ? 'active' : ''].filter(Boolean).join(', ');
  return `  [${train.channel}] ${train.name} - ${status}${flags ? ` [${flags}]` : ''} - ${describeSignal(train)}`;
}

export function formatSwitch(entry: ConnectedSwitch): string {
  const { status } = entry;
  let ports = 'no status';
  if (status) {
    ports =
      PORTS.filter((port) => status.portConnected[port])
        .map((port) => {
          const position = positionName(status.positions[port]);
          const stats = entry.reliability[`SWITCH_${port}`];
          return stats ? `${port}=${position} (${stats.successRate}% of ${stats.attempts})` : `${port}=${position}`;
        })
        .join(' ') || 'no ports connected';
  }
  return `  [${entry.channel}] ${entry.name} - ${ports} - ${describeSignal(entry)}`;
}

function describeSignal(hub: { rssi: number | null; lastUpdateSecondsAgo: number }): string {
  const rssi = hub.rssi === null ? '?' : `${hub.rssi} dBm`;
  return `${rssi}, ${hub.lastUpdateSecondsAgo}s ago`;
}
