import { openSerialReader } from '@services/credential-reader/serial-reader.js'
import { SerialPortMock } from 'serialport'
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../mocks/logger.js'

vi.mock('serialport', async () => {
  const actual = await vi.importActual<typeof import('serialport')>('serialport')
  return { ...actual, SerialPort: actual.SerialPortMock }
})

const PORT_PATH = '/dev/ttyTEST0'

describe('openSerialReader', () => {
  beforeEach(() => {
    SerialPortMock.binding.createPort(PORT_PATH)
  })

  afterEach(() => {
    SerialPortMock.binding.reset()
  })

  it('should end the line sequence once the port is closed', async () => {
    const source = await openSerialReader(
      { path: PORT_PATH, baudRate: 9600 },
      createMockLogger(),
    )
    const consumed = (async () => {
      const lines: string[] = []
      for await (const line of source.lines) {
        lines.push(line)
      }
      return lines
    })()

    await source.close()

    await expect(consumed).resolves.toEqual([])
  })

  it('should reject when the port does not exist', async () => {
    await expect(
      openSerialReader({ path: '/dev/ttyMISSING', baudRate: 9600 }, createMockLogger()),
    ).rejects.toThrow()
  })
})
