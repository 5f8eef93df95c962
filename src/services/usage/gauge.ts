import { palette } from '@/theme/colors';
import { clamp } from '@/utils/math';
import { formatClock, formatPercent, formatResetCountdown, formatValue } from '@/utils/formatters';

export const GAUGE_WIDTH = 30;

export const gaugeColor = (percent: number) => {
  if (percent >= 90) {
    return palette.danger;
  }
  if (percent >= 70) {
    return palette.warning;
  }
  return palette.success;
};

export const renderBar = (percent: number, width = GAUGE_WIDTH) => {
  const filled = clamp(Math.round((percent / 100) * width), 0, width);
  return '█'.repeat(filled) + '░'.repeat(width - filled);
};

export interface GaugeLine {
  at: Date;
  utilizationPercent: number;
  remaining: number;
  resetsAt?: Date | null;
}

export const formatGaugeLine = ({ at, utilizationPercent, remaining, resetsAt }: GaugeLine) => {
  const bar = `${gaugeColor(utilizationPercent)}${renderBar(utilizationPercent)}${palette.reset}`;
  const reset = resetsAt ? `  (resets in ${formatResetCountdown(resetsAt, at)})` : '';
  return `  [${formatClock(at)}]  ${bar} ${formatPercent(utilizationPercent)} used → galvo ${formatValue(remaining)}${reset}`;
};

export const formatWarningLine = (at: Date, message: string) => `  [${formatClock(at)}]  ⚠ ${message}`;
