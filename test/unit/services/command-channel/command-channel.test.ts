import { CommandChannelService } from '@services/command-channel/command-channel.service.js'
import { describe, expect, it } from 'vitest'
import {
  createMockAccessLog,
  createMockActuator,
  HARVEY,
  JONES,
  SITES,
} from '../../../mocks/access.js'
import { FakeRemoteCollection, flush } from '../../../mocks/directory-source.js'
import { createMockLogger } from '../../../mocks/logger.js'

function setup(actuated = true) {
  const commands = new FakeRemoteCollection()
  const actuator = createMockActuator(actuated)
  const accessLog = createMockAccessLog()
  const channel = new CommandChannelService(
    createMockLogger(),
    { commands, actuator, accessLog },
    {
      community: 'Transcore',
      sites: SITES,
      defaultSite: JONES,
      holdSeconds: 0.5,
      pairingHoldSeconds: 10,
    },
  )
  return { commands, actuator, accessLog, channel }
}

async function settle(channel: CommandChannelService): Promise<void> {
  await flush()
  await channel.drain()
}

describe('CommandChannelService', () => {
  it('should execute a new command and then delete it', async () => {
    const { commands, actuator, accessLog, channel } = setup()
    await channel.subscribe()
    await settle(channel)

    commands.set('cmd-1', {
      community: 'Transcore',
      command: 'open_gate',
      address: 'Harvey House',
    })
    await settle(channel)

    expect(actuator.open).toHaveBeenCalledWith(HARVEY, 0.5)
    expect(accessLog.log).not.toHaveBeenCalled()
    expect(commands.removedIds).toEqual(['cmd-1'])
    expect(commands.documents.has('cmd-1')).toBe(false)
  })

  it('should pick up commands issued before it subscribed', async () => {
    const { commands, actuator, channel } = setup()
    commands.documents.set('early', { community: 'Transcore', command: 'open_gate' })

    await channel.subscribe()
    await settle(channel)

    expect(actuator.open).toHaveBeenCalledWith(JONES, 0.5)
    expect(commands.removedIds).toEqual(['early'])
  })

  it('should only listen to its own community', async () => {
    const { commands, actuator, channel } = setup()
    await channel.subscribe()

    commands.set('foreign', { community: 'Elsewhere', command: 'open_gate' })
    await settle(channel)

    expect(actuator.open).not.toHaveBeenCalled()
    expect(commands.documents.has('foreign')).toBe(true)
  })

  it('should log pairing mode as a remote grant', async () => {
    const { accessLog, actuator, channel } = setup()

    const outcome = await channel.submit('pair', {
      community: 'Transcore',
      command: 'pairing_mode',
    })

    expect(outcome).toEqual({
      id: 'pair',
      status: 'executed',
      command: 'pairing_mode',
      site: 'jones',
      actuated: true,
      deleted: true,
    })
    expect(actuator.open).toHaveBeenCalledWith(JONES, 10)
    expect(accessLog.log).toHaveBeenCalledWith(
      'Access granted (Remote)',
      'Jones House',
    )
  })

  it('should actuate once when the same command is delivered twice', async () => {
    const { actuator, channel } = setup()
    const document = { community: 'Transcore', command: 'open_gate' }

    const [first, second] = await Promise.all([
      channel.submit('dup', document),
      channel.submit('dup', document),
    ])
    const replay = await channel.submit('dup', document)

    expect(first.status).toBe('executed')
    expect(second).toEqual({ id: 'dup', status: 'skipped', reason: 'in_flight' })
    expect(replay).toEqual({
      id: 'dup',
      status: 'skipped',
      reason: 'already_processed',
      deleted: true,
    })
    expect(actuator.open).toHaveBeenCalledTimes(1)
  })

  it('should wait for the delete of a replayed command when draining', async () => {
    const { commands, actuator, channel } = setup()
    const document = { community: 'Transcore', command: 'open_gate' }
    await channel.submit('again', document)

    let finishRemove: () => void = () => {}
    commands.remove = (id) =>
      new Promise<void>((resolve) => {
        finishRemove = () => {
          commands.removedIds.push(id)
          resolve()
        }
      })
    channel.handleChanges([{ kind: 'ADDED', id: 'again', document }])

    let drained = false
    const draining = channel.drain().then(() => {
      drained = true
    })
    await flush()
    expect(drained).toBe(false)

    finishRemove()
    await draining
    expect(commands.removedIds).toEqual(['again', 'again'])
    expect(actuator.open).toHaveBeenCalledTimes(1)
  })

  it('should delete a command even when actuation fails', async () => {
    const { commands, channel } = setup(false)

    const outcome = await channel.submit('fail', {
      community: 'Transcore',
      command: 'open_gate',
    })

    expect(outcome).toMatchObject({ status: 'executed', actuated: false, deleted: true })
    expect(commands.removedIds).toEqual(['fail'])
  })

  it('should delete a command when the actuator throws', async () => {
    const { commands, actuator, channel } = setup()
    actuator.open.mockRejectedValue(new Error('relay tool missing'))

    const outcome = await channel.submit('boom', {
      community: 'Transcore',
      command: 'open_gate',
    })

    expect(outcome).toMatchObject({ status: 'executed', actuated: false, deleted: true })
    expect(commands.removedIds).toEqual(['boom'])
  })

  it('should discard and delete malformed commands without actuating', async () => {
    const { commands, actuator, channel } = setup()

    const unknown = await channel.submit('u', {
      community: 'Transcore',
      command: 'reboot',
    })
    const badAddress = await channel.submit('a', {
      community: 'Transcore',
      command: 'open_gate',
      address: 'Smith House',
    })
    const wrongType = await channel.submit('w', {
      community: 'Transcore',
      command: 42,
    })

    expect(unknown).toEqual({
      id: 'u',
      status: 'discarded',
      reason: 'unknown_command',
      deleted: true,
    })
    expect(badAddress.reason).toBe('invalid_address')
    expect(wrongType.reason).toBe('unknown_command')
    expect(actuator.open).not.toHaveBeenCalled()
    expect(commands.removedIds).toEqual(['u', 'a', 'w'])
  })

  it('should report a failed delete without throwing', async () => {
    const { commands, channel } = setup()
    commands.removeError = new Error('permission denied')

    const outcome = await channel.submit('keep', {
      community: 'Transcore',
      command: 'open_gate',
    })

    expect(outcome).toMatchObject({ status: 'executed', deleted: false })
  })

  it('should stop receiving commands after stop', async () => {
    const { commands, actuator, channel } = setup()
    await channel.subscribe()
    await channel.stop()

    commands.set('late', { community: 'Transcore', command: 'open_gate' })
    await settle(channel)

    expect(actuator.open).not.toHaveBeenCalled()
    expect(channel.subscribed).toBe(false)
  })
})
