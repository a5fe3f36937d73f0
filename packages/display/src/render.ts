import { systemClock, type Clock, type TheaterResult } from '@showtime-console/shared';

/**
 * One theater's listing as a step of the display cycle.
 */
export interface DisplayUnit {
  theater: TheaterResult;
  position: number;
  total: number;
}

export type RenderTarget = { kind: 'theater'; unit: DisplayUnit } | { kind: 'empty' };

export type Renderer = (target: RenderTarget) => void | Promise<void>;

export interface RenderOutput {
  write(chunk: string): unknown;
}

export interface ConsoleRendererOptions {
  output?: RenderOutput;
  clock?: Clock;
  timeZone?: string;
  clearScreen?: boolean;
}

const WIDTH = 100;
const TITLE_WIDTH = 60;
const CLEAR_SCREEN = '\x1b[2J\x1b[H';

const RULE = '='.repeat(WIDTH);
const THIN_RULE = '-'.repeat(WIDTH);

/**
 * YYYY-MM-DD HH:MM:SS TZ 形式で指定タイムゾーンの時刻を整形する
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    second: '2-digit',
    hourCycle: 'h23',
    timeZoneName: 'short',
  }).formatToParts(date);
  const get = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((part) => part.type === type)?.value ?? '';

  return `${get('year')}-${get('month')}-${get('day')} ${get('hour')}:${get('minute')}:${get('second')} ${get('timeZoneName')}`;
}

function movieLines(theater: TheaterResult): string[] {
  const lines: string[] = [];
  for (const movie of theater.movies) {
    const label = movie.rating ? `${movie.title} [${movie.rating}]` : movie.title;
    const title = label.slice(0, TITLE_WIDTH - 1).padEnd(TITLE_WIDTH);
    const [first, ...rest] = movie.showtimes;
    if (first === undefined) {
      lines.push(`${title} (no times)`);
      continue;
    }
    lines.push(`${title} ${first}`);
    for (const time of rest) {
      lines.push(`${''.padEnd(TITLE_WIDTH)} ${time}`);
    }
  }
  return lines;
}

/**
 * 1画面分のテキストを組み立てる
 */
export function formatScreen(target: RenderTarget, now: Date, timeZone: string): string[] {
  const lines = ['', RULE, `MOVIE SHOWTIMES @ ${formatTimestamp(now, timeZone)}`, RULE];

  if (target.kind === 'empty') {
    lines.push('No theaters to display. Check your config or cache.', RULE);
    return lines;
  }

  const { theater, position, total } = target.unit;
  lines.push(`Theater: ${theater.name} (${position}/${total})`);
  lines.push(`Location: ${theater.location ?? '-'}`);
  if (theater.address) {
    lines.push(`Address: ${theater.address}`);
  }
  lines.push(RULE);

  if (theater.movies.length === 0) {
    lines.push('No showtimes found', RULE);
    return lines;
  }

  lines.push(`${'MOVIE'.padEnd(TITLE_WIDTH)} TIMES`, THIN_RULE);
  lines.push(...movieLines(theater));
  lines.push(THIN_RULE);

  const entryCount = theater.movies.reduce((sum, movie) => sum + movie.showtimes.length, 0);
  lines.push(`Total showtime entries: ${entryCount}`, RULE);
  return lines;
}

/**
 * コンソールに表示するレンダラーを作成する
 */
export function createConsoleRenderer(options: ConsoleRendererOptions = {}): Renderer {
  const output = options.output ?? process.stdout;
  const clock = options.clock ?? systemClock;
  const timeZone = options.timeZone ?? 'UTC';
  const clearScreen = options.clearScreen ?? true;

  return (target) => {
    const text = formatScreen(target, clock.now(), timeZone).join('\n');
    output.write(`${clearScreen ? CLEAR_SCREEN : ''}${text}\n`);
  };
}
