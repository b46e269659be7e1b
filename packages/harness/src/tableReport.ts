import chalk from 'chalk';
import { quantity as q } from '@cadence/base';
import type { Summary } from '@cadence/samplers';
import { visibleWidth } from './util.js';

export interface RenderOptions {
  /** Style the report with ANSI colors (default: as supported by the terminal) */
  color?: boolean;
}

type Row = [label: string, value: string];

const colMargin = 2;

function pad(cell: string, width: number, align: 'left' | 'right') {
  const fill = ' '.repeat(Math.max(0, width - visibleWidth(cell)));
  return align === 'left' ? cell + fill : fill + cell;
}

/**
 * Render a summary as a two column table of statistics, with durations in
 * the largest units that fit them.
 */
export function render(title: string, summary: Summary, opts: RenderOptions = {}): string[] {
  const c = opts.color === false ? new chalk.Instance({ level: 0 }) : chalk;
  const fmt = q.formatter('time');
  const time = (seconds: number) => fmt.format(q.create('second', seconds));

  const rows: Row[] = [
    [c.dim('count'), String(summary.count)],
    [c.dim('min'), time(summary.min)],
    [c.dim('max'), time(summary.max)],
    [c.dim('mean'), c.bold(time(summary.mean))],
    [c.dim('stdev'), time(summary.stdev)],
    [c.dim('total'), time(summary.total)],
  ];

  const labelWidth = Math.max(...rows.map(([label]) => visibleWidth(label)));
  const valueWidth = Math.max(...rows.map(([, value]) => visibleWidth(value)));
  const margin = ' '.repeat(colMargin);

  return [
    c.bold(title),
    ...rows.map(
      ([label, value]) =>
        margin + pad(label, labelWidth, 'left') + margin + pad(value, valueWidth, 'right'),
    ),
  ];
}
