import winston from 'winston'

export const log = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  silent: process.env.LOG_SILENT === 'true',
  format: winston.format.combine(
    winston.format.errors({ stack: true }),
    winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    winston.format.printf(({ timestamp, level, message, ...rest }) => {
      const extra = Object.keys(rest).length ? ' ' + JSON.stringify(rest) : ''
      return `${timestamp} [${level.toUpperCase()}] ${message}${extra}`
    })
  ),
  transports: [new winston.transports.Console()],
})

/**
 * 把任意异常转成可记录的字符串
 */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message
  return String(err)
}
