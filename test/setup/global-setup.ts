/**
 * Global test setup and teardown
 */

export async function setup(): Promise<void> {
  process.env.NODE_ENV = 'test'
  process.env.logLevel = 'silent'
  process.env.enableConsoleOutput = 'false'
  process.env.enableReader = 'false'
  process.env.accessLogUrl = ''
}

export async function teardown(): Promise<void> {}
