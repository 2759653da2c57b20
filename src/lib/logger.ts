import pino from 'pino'

const defaultLevel = process.env.NODE_ENV === 'test' ? 'silent' : 'info'

/**
 * Process-wide structured logger. Set LOG_LEVEL to override the default
 * (`info`, or `silent` under the test runner).
 */
export const logger = pino({
  name: 'route-planner',
  level: process.env.LOG_LEVEL || defaultLevel
})
