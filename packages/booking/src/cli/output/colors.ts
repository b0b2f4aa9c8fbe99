export const colors = {
  reset: '\x1b[0m',
  bold: '\x1b[1m',
  dim: '\x1b[2m',
  green: '\x1b[32m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  cyan: '\x1b[36m',
  gray: '\x1b[90m',
} as const

export const isColorSupported = Boolean(process.stdout.isTTY) && !process.env.NO_COLOR

export function c(color: keyof typeof colors, text: string): string {
  return isColorSupported ? `${colors[color]}${text}${colors.reset}` : text
}
