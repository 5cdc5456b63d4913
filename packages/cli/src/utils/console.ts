/**
 * Console output for the pa2 command.
 * Progress and results go to stdout, problems to stderr.
 */

const MARK = {
    success: '✓',
    info: 'ℹ',
    arrow: '→',
    warn: '⚠',
    fail: '✖',
} as const;

type Mark = keyof typeof MARK;

const marked = (mark: Mark, message: string): string => `${MARK[mark]} ${message}`;

export const log = (message: string): void => console.log(message);
export const success = (message: string): void => console.log(marked('success', message));
export const info = (message: string): void => console.log(marked('info', message));
export const arrow = (message: string): void => console.log(marked('arrow', message));
export const warn = (message: string): void => console.error(marked('warn', message));
export const fail = (message: string): void => console.error(marked('fail', message));

/**
 * Pipeline progress line, e.g. "→ [2/5] Load File".
 */
export const step = (index: number, total: number, name: string): void => arrow(`[${index}/${total}] ${name}`);
