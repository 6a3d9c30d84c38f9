/**
 * Console colors.
 *
 * A-share convention: red for up, green for down.
 */

import chalk, { type ChalkInstance } from 'chalk';

type Paint = (text: string) => string;

export interface Theme {
  readonly chalk: ChalkInstance;
  up: Paint;
  down: Paint;
  flat: Paint;
  heading: Paint;
  label: Paint;
  accent: Paint;
  muted: Paint;
  link: Paint;
  info: Paint;
  warn: Paint;
  error: Paint;
  success: Paint;
  /** Color by sign: red above zero, green below, plain at zero */
  bySign(value: number): Paint;
}

/**
 * @param instance - pass `new Chalk({ level: 0 })` for plain text
 */
export function createTheme(instance: ChalkInstance = chalk): Theme {
  const theme: Theme = {
    chalk: instance,
    up: (text) => instance.red(text),
    down: (text) => instance.green(text),
    flat: (text) => instance.white(text),
    heading: (text) => instance.bold.magenta(text),
    label: (text) => instance.cyan(text),
    accent: (text) => instance.bold.cyan(text),
    muted: (text) => instance.gray(text),
    link: (text) => instance.underline.cyan(text),
    info: (text) => instance.blue(text),
    warn: (text) => instance.yellow(text),
    error: (text) => instance.red(text),
    success: (text) => instance.green(text),
    bySign(value) {
      if (value > 0) return theme.up;
      if (value < 0) return theme.down;
      return theme.flat;
    },
  };
  return theme;
}
