import {
    CollectionMinter,
    Logger,
    ManualClock,
    MintLedger,
    loadConfig,
    type MinterConfig,
    type MinterConfigInput,
} from '../src/index.js'

export const ALICE = '0x' + 'a'.repeat(40)
export const BOB = '0x' + 'b'.repeat(40)
export const CAROL = '0x' + 'c'.repeat(40)

export const PRICE = 50_000_000_000_000_000n

/** Address number n, e.g. wallet(7) = 0x000...0007 */
export function wallet(n: number): string {
    return '0x' + n.toString(16).padStart(40, '0')
}

export function testConfig(overrides: Partial<MinterConfigInput> = {}): MinterConfig {
    return loadConfig({ env: {}, overrides })
}

export function newLedger(overrides: Partial<MinterConfigInput> = {}) {
    const clock = new ManualClock()
    const ledger = new MintLedger({ config: testConfig(overrides), clock, logger: Logger.silent() })
    return { ledger, clock }
}

export function newMinter(overrides: Partial<MinterConfigInput> = {}) {
    const clock = new ManualClock()
    const minter = new CollectionMinter({ config: testConfig(overrides), clock, logger: Logger.silent() })
    return { minter, clock }
}
