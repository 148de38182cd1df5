import { describe, it } from 'node:test'
import * as assert from 'node:assert'
import { SingleFlight } from '../src/lib/singleFlight.js'
import { gate } from './fakes.js'

describe('SingleFlight', () => {
  it('should run work once for concurrent callers and share the value', async () => {
    const flights = new SingleFlight<string>()
    const g = gate()
    let runs = 0
    const work = async () => {
      runs++
      await g.wait
      return 'value'
    }

    const first = flights.do('k', work)
    const second = flights.do('k', work)
    const third = flights.do('k', work)
    assert.strictEqual(flights.inFlight('k'), true)
    g.open()

    const results = await Promise.all([first, second, third])
    assert.strictEqual(runs, 1)
    assert.deepStrictEqual(results, [
      { value: 'value', shared: true },
      { value: 'value', shared: true },
      { value: 'value', shared: true },
    ])
    assert.strictEqual(flights.size, 0)
  })

  it('should report a solo call as not shared', async () => {
    const flights = new SingleFlight<number>()
    assert.deepStrictEqual(await flights.do('k', async () => 42), { value: 42, shared: false })
  })

  it('should hand the same rejection to every waiter', async () => {
    const flights = new SingleFlight<string>()
    const g = gate()
    const failure = new Error('origin down')
    let runs = 0
    const work = async (): Promise<string> => {
      runs++
      await g.wait
      throw failure
    }

    const first = flights.do('k', work)
    const second = flights.do('k', work)
    g.open()

    await Promise.all([
      assert.rejects(first, (err) => err === failure),
      assert.rejects(second, (err) => err === failure),
    ])
    assert.strictEqual(runs, 1)
    assert.strictEqual(flights.inFlight('k'), false)
  })

  it('should start a fresh execution once the key is released', async () => {
    const flights = new SingleFlight<number>()
    let runs = 0
    const work = async () => ++runs

    assert.strictEqual((await flights.do('k', work)).value, 1)
    assert.strictEqual((await flights.do('k', work)).value, 2)
  })

  it('should not serialize unrelated keys', async () => {
    const flights = new SingleFlight<string>()
    const g = gate()
    const slow = flights.do('a', async () => {
      await g.wait
      return 'a'
    })

    const fast = await flights.do('b', async () => 'b')
    assert.deepStrictEqual(fast, { value: 'b', shared: false })
    assert.strictEqual(flights.inFlight('a'), true)

    g.open()
    assert.strictEqual((await slow).value, 'a')
  })

  it('should release the key when work throws synchronously', async () => {
    const flights = new SingleFlight<string>()
    await assert.rejects(
      flights.do('k', () => {
        throw new Error('sync failure')
      }),
      { message: 'sync failure' }
    )
    assert.strictEqual(flights.inFlight('k'), false)
  })
})
