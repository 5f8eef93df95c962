import type { ActuationCommand } from '@/types/device';

const pad2 = (value: number) => value.toString().padStart(2, '0');

export const formatValue = (value: number) => value.toFixed(4);

export const formatPercent = (value: number) => `${value.toFixed(1)}%`;

export const formatClock = (date: Date) =>
  `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;

export const formatWrite = (command: ActuationCommand) =>
  command.channel === null
    ? `Wrote ${formatValue(command.value)}`
    : `Wrote ${formatValue(command.value)} to channel ${command.channel}`;

export const formatResetCountdown = (resetsAt: Date, now: Date) => {
  const secs = (resetsAt.getTime() - now.getTime()) / 1000;
  if (secs <= 0) {
    return 'already reset';
  }

  const hours = Math.floor(secs / 3600);
  const minutes = Math.floor((secs % 3600) / 60);
  if (hours > 24) {
    return `${Math.floor(hours / 24)}d ${hours % 24}h`;
  }
  return `${hours}h ${minutes}m`;
};
