import { expect } from 'chai'
import { MintLedger, Logger, ManualClock, unwrap } from '../src/index.js'
import { ALICE, BOB, CAROL, PRICE, newLedger, testConfig, wallet } from './helpers.js'

function expectInvariants(ledger: MintLedger) {
    expect(ledger.tokenIds().length).to.equal(ledger.totalSupply())
    expect(ledger.totalSupply()).to.be.at.most(ledger.maxSupply())
    expect(ledger.phase === 'SoldOut').to.equal(ledger.totalSupply() === ledger.maxSupply())
}

describe('MintLedger', () => {
    // ═══════════════════════════════════════════
    // Initial state
    // ═══════════════════════════════════════════

    describe('initial state', () => {
        it('starts in Allowlist with nothing minted', () => {
            const { ledger } = newLedger()
            expect(ledger.phase).to.equal('Allowlist')
            expect(ledger.totalSupply()).to.equal(0)
            expect(ledger.maxSupply()).to.equal(9999)
            expect(ledger.tokenIds()).to.deep.equal([])
            expect(ledger.events.length).to.equal(0)
        })

        it('reports the allowlist rule', () => {
            const { ledger } = newLedger()
            expect(ledger.mintRule()).to.deep.equal({
                phase: 'Allowlist',
                maxPerWallet: 2,
                priceWei: PRICE,
                active: true,
            })
        })

        it('can start Closed, which rejects every mint', () => {
            const ledger = new MintLedger({
                config: testConfig(),
                clock: new ManualClock(),
                logger: Logger.silent(),
                initialPhase: 'Closed',
            })
            unwrap(ledger.allowlist.add([ALICE]))
            const result = ledger.mint(ALICE, 1, PRICE)
            expect(result.ok).to.be.false
            if (!result.ok) expect(result.error).to.deep.equal({ kind: 'PhaseClosed', phase: 'Closed' })
            expect(ledger.mintRule().maxPerWallet).to.equal(0)
        })
    })

    // ═══════════════════════════════════════════
    // Scenarios
    // ═══════════════════════════════════════════

    describe('scenarios', () => {
        it('A: non-member mint during Allowlist fails with NotAllowlisted', () => {
            const { ledger } = newLedger()
            const result = ledger.mint(ALICE, 1, PRICE)
            expect(result.ok).to.be.false
            if (!result.ok) expect(result.error).to.deep.equal({ kind: 'NotAllowlisted', address: ALICE })
            expect(ledger.totalSupply()).to.equal(0)
        })

        it('B: allowlisted mint succeeds and returns [1]', () => {
            const { ledger } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))

            expect(unwrap(ledger.mint(ALICE, 1, PRICE))).to.deep.equal([1])
            expect(unwrap(ledger.ownerOf(1))).to.equal(ALICE)
            expect(ledger.totalSupply()).to.equal(1)
            expectInvariants(ledger)
        })

        it('C: second allowlist mint over the cap fails with WalletLimitExceeded', () => {
            const { ledger } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))
            unwrap(ledger.mint(ALICE, 1, PRICE))

            const result = ledger.mint(ALICE, 2, PRICE * 2n)
            expect(result.ok).to.be.false
            if (!result.ok) {
                expect(result.error).to.deep.equal({
                    kind: 'WalletLimitExceeded',
                    address: ALICE,
                    count: 1,
                    requested: 2,
                    limit: 2,
                })
            }
            expect(ledger.totalSupply()).to.equal(1)
        })

        it('D: public phase ignores the allowlist', () => {
            const { ledger } = newLedger()
            unwrap(ledger.advanceToPublic())

            expect(unwrap(ledger.mint(BOB, 5, PRICE * 5n))).to.deep.equal([1, 2, 3, 4, 5])
            expect(ledger.balanceOf(BOB)).to.equal(5)
            expectInvariants(ledger)
        })

        it('E: reveal waits for the delay, then points at the token image', () => {
            const { ledger, clock } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))
            unwrap(ledger.mint(ALICE, 1, PRICE))

            const early = ledger.reveal(1)
            expect(early.ok).to.be.false
            if (!early.ok) expect(early.error.kind).to.equal('RevealNotReady')

            clock.advance(300)
            const metadata = unwrap(ledger.reveal(1))
            expect(metadata.revealed).to.be.true
            expect(metadata.image).to.equal('ipfs://QmMangoTangoCollectionBaseUriPlaceholder/1.png')
            expect(unwrap(ledger.getMetadata(1)).revealed).to.be.true
        })

        it('F: minting to max supply sells out and blocks further mints', () => {
            const { ledger } = newLedger({ maxSupply: 12 })
            unwrap(ledger.advanceToPublic())

            unwrap(ledger.mint(wallet(1), 5, PRICE * 5n))
            unwrap(ledger.mint(wallet(2), 5, PRICE * 5n))
            expect(ledger.phase).to.equal('Public')
            expectInvariants(ledger)

            expect(unwrap(ledger.mint(wallet(3), 2, PRICE * 2n))).to.deep.equal([11, 12])
            expect(ledger.phase).to.equal('SoldOut')
            expectInvariants(ledger)

            for (const address of [wallet(3), wallet(4), ALICE]) {
                const result = ledger.mint(address, 1, PRICE)
                expect(result.ok).to.be.false
                if (!result.ok) expect(result.error).to.deep.equal({ kind: 'PhaseClosed', phase: 'SoldOut' })
            }
            expect(ledger.totalSupply()).to.equal(12)
        })
    })

    // ═══════════════════════════════════════════
    // Validation order
    // ═══════════════════════════════════════════

    describe('canMint', () => {
        it('rejects malformed addresses and quantities first', () => {
            const { ledger } = newLedger()
            expect(ledger.canMint('0x1234', 1, PRICE).error).to.deep.equal({ kind: 'InvalidAddress', address: '0x1234' })
            expect(ledger.canMint(ALICE, 0, PRICE).error).to.deep.equal({ kind: 'InvalidQuantity', quantity: 0 })
            expect(ledger.canMint(ALICE, 1.5, PRICE).error).to.deep.equal({ kind: 'InvalidQuantity', quantity: 1.5 })
        })

        it('checks supply before payment', () => {
            const { ledger } = newLedger({ maxSupply: 3 })
            const check = ledger.canMint(ALICE, 4, 0n)
            expect(check.allowed).to.be.false
            expect(check.error).to.deep.equal({ kind: 'SupplyExceeded', current: 0, requested: 4, cap: 3 })
            expect(check.reason).to.equal('Would exceed max supply: 0 + 4 > 3')
        })

        it('checks payment before allowlist membership', () => {
            const { ledger } = newLedger()
            const check = ledger.canMint(ALICE, 2, PRICE)
            expect(check.error).to.deep.equal({ kind: 'InsufficientPayment', offered: PRICE, required: PRICE * 2n })
        })

        it('checks allowlist membership before the wallet cap', () => {
            const { ledger } = newLedger()
            expect(ledger.canMint(ALICE, 3, PRICE * 3n).error?.kind).to.equal('NotAllowlisted')
            unwrap(ledger.allowlist.add([ALICE]))
            expect(ledger.canMint(ALICE, 3, PRICE * 3n).error?.kind).to.equal('WalletLimitExceeded')
        })

        it('accepts overpayment', () => {
            const { ledger } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))
            expect(ledger.canMint(ALICE, 1, PRICE + 1n)).to.deep.equal({ allowed: true })
        })

        it('does not change state', () => {
            const { ledger } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))
            const eventsBefore = ledger.events.length
            ledger.canMint(ALICE, 1, PRICE)
            expect(ledger.totalSupply()).to.equal(0)
            expect(ledger.walletMintCount(ALICE)).to.equal(0)
            expect(ledger.events.length).to.equal(eventsBefore)
        })

        it('agrees with mint on every outcome', () => {
            const { ledger } = newLedger({ maxSupply: 8 })
            unwrap(ledger.allowlist.add([ALICE]))
            const attempts: Array<[string, number, bigint]> = [
                [BOB, 1, PRICE],
                [ALICE, 1, 0n],
                [ALICE, 2, PRICE * 2n],
                [ALICE, 1, PRICE],
                [CAROL, 9, PRICE * 9n],
            ]
            for (const [address, quantity, value] of attempts) {
                const check = ledger.canMint(address, quantity, value)
                const result = ledger.mint(address, quantity, value)
                expect(result.ok).to.equal(check.allowed)
                if (!result.ok) expect(result.error).to.deep.equal(check.error)
            }
        })
    })

    // ═══════════════════════════════════════════
    // Per-wallet counting across phases
    // ═══════════════════════════════════════════

    describe('wallet counts', () => {
        it('carries allowlist mints into the public cap', () => {
            const { ledger } = newLedger()
            unwrap(ledger.allowlist.add([ALICE]))
            unwrap(ledger.mint(ALICE, 2, PRICE * 2n))
            unwrap(ledger.advanceToPublic())

            const over = ledger.mint(ALICE, 4, PRICE * 4n)
            expect(over.ok).to.be.false
            if (!over.ok) {
                expect(over.error).to.deep.equal({
                    kind: 'WalletLimitExceeded',
                    address: ALICE,
                    count: 2,
                    requested: 4,
                    limit: 5,
                })
            }
            expect(unwrap(ledger.mint(ALICE, 3, PRICE * 3n))).to.deep.equal([3, 4, 5])
            expect(ledger.walletMintCount(ALICE)).to.equal(5)
        })

        it('treats differently cased addresses as one wallet', () => {
            const { ledger } = newLedger()
            unwrap(ledger.advanceToPublic())
            const mixed = '0x' + 'Aa'.repeat(20)
            const lower = '0x' + 'aa'.repeat(20)

            unwrap(ledger.mint(mixed, 3, PRICE * 3n))
            unwrap(ledger.mint(`  ${lower}  `, 2, PRICE * 2n))
            expect(ledger.walletMintCount(lower)).to.equal(5)
            expect(ledger.balanceOf(mixed.toUpperCase().replace('0X', '0x'))).to.equal(5)
            expect(unwrap(ledger.ownerOf(1))).to.equal(lower)
        })
    })

    // ═══════════════════════════════════════════
    // Ownership queries
    // ═══════════════════════════════════════════

    describe('ownership', () => {
        it('ownerOf and getMetadata fail for unknown ids', () => {
            const { ledger } = newLedger()
            for (const id of [0, 1, -1, 99]) {
                const owner = ledger.ownerOf(id)
                const metadata = ledger.getMetadata(id)
                expect(owner.ok).to.be.false
                expect(metadata.ok).to.be.false
                if (!owner.ok) expect(owner.error).to.deep.equal({ kind: 'InvalidTokenId', tokenId: id })
            }
        })

        it('getMetadata hands out copies that cannot rewrite the stored record', () => {
            const { ledger, clock } = newLedger()
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(ALICE, 1, PRICE))

            const copy = unwrap(ledger.getMetadata(1))
            copy.revealed = true
            copy.image = 'ipfs://elsewhere/1.png'
            copy.attributes.length = 0

            const stored = unwrap(ledger.getMetadata(1))
            expect(ledger.isRevealed(1)).to.be.false
            expect(stored.image).to.equal('ipfs://QmMangoTangoCollectionBaseUriPlaceholder/hidden.png')
            expect(stored.attributes).to.have.lengthOf.at.least(5)

            clock.advance(300)
            const revealed = unwrap(ledger.reveal(1))
            revealed.attributes[0].value = 'Edited'
            expect(unwrap(ledger.getMetadata(1)).attributes[0]).to.deep.equal({ traitType: 'Background', value: 'Midnight' })
        })

        it('tokensOfOwner lists ids in mint order and matches a scan of ownerOf', () => {
            const { ledger } = newLedger()
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(ALICE, 2, PRICE * 2n))
            unwrap(ledger.mint(BOB, 1, PRICE))
            unwrap(ledger.mint(ALICE, 1, PRICE))

            expect(ledger.tokensOfOwner(ALICE)).to.deep.equal([1, 2, 4])
            expect(ledger.tokensOfOwner(BOB)).to.deep.equal([3])
            expect(ledger.tokensOfOwner(CAROL)).to.deep.equal([])

            for (const address of [ALICE, BOB, CAROL]) {
                const scanned = ledger.tokenIds().filter((id) => unwrap(ledger.ownerOf(id)) === address)
                expect(ledger.tokensOfOwner(address)).to.deep.equal(scanned)
                expect(ledger.balanceOf(address)).to.equal(scanned.length)
            }
        })

        it('returns a copy from tokensOfOwner', () => {
            const { ledger } = newLedger()
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(ALICE, 1, PRICE))
            ledger.tokensOfOwner(ALICE).push(42)
            expect(ledger.tokensOfOwner(ALICE)).to.deep.equal([1])
        })
    })

    // ═══════════════════════════════════════════
    // Reveal
    // ═══════════════════════════════════════════

    describe('reveal', () => {
        it('sets readiness to mint time + reveal delay', () => {
            const { ledger, clock } = newLedger()
            unwrap(ledger.advanceToPublic())
            const mintedAt = clock.now()
            unwrap(ledger.mint(ALICE, 1, PRICE))
            expect(ledger.revealReadyAt(1)).to.equal(mintedAt + 300)
        })

        it('fails for unknown ids', () => {
            const { ledger } = newLedger()
            const result = ledger.reveal(5)
            expect(result.ok).to.be.false
            if (!result.ok) expect(result.error).to.deep.equal({ kind: 'InvalidTokenId', tokenId: 5 })
        })

        it('reports readyAt and now when too early', () => {
            const { ledger, clock } = newLedger()
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(ALICE, 1, PRICE))
            const start = clock.now()
            clock.advance(299)

            const result = ledger.reveal(1)
            expect(result.ok).to.be.false
            if (!result.ok) {
                expect(result.error).to.deep.equal({
                    kind: 'RevealNotReady',
                    tokenId: 1,
                    readyAt: start + 300,
                    now: start + 299,
                })
            }
            expect(ledger.isRevealed(1)).to.be.false
        })

        it('keeps attributes and image when revealed twice; only revealedAt moves', () => {
            const { ledger, clock } = newLedger()
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(ALICE, 1, PRICE))
            const unrevealed = unwrap(ledger.getMetadata(1))

            clock.advance(300)
            const first = unwrap(ledger.reveal(1))
            clock.advance(60)
            const second = unwrap(ledger.reveal(1))

            expect(second.attributes).to.deep.equal(first.attributes)
            expect(second.attributes).to.deep.equal(unrevealed.attributes)
            expect(second.image).to.equal(first.image)
            expect(second.revealedAt).to.equal((first.revealedAt ?? 0) + 60)
            expect(ledger.events.ofType('TokenRevealed').map((e) => e.tokenId)).to.deep.equal([1, 1])
        })
    })

    // ═══════════════════════════════════════════
    // Phase advance
    // ═══════════════════════════════════════════

    describe('advanceToPublic', () => {
        it('moves Allowlist to Public once', () => {
            const { ledger } = newLedger()
            expect(unwrap(ledger.advanceToPublic())).to.equal('Public')
            expect(unwrap(ledger.advanceToPublic())).to.equal('Public')

            const advances = ledger.events.ofType('PhaseAdvanced')
            expect(advances.map((e) => [e.from, e.to])).to.deep.equal([['Allowlist', 'Public']])
        })

        it('is rejected after sell-out', () => {
            const { ledger } = newLedger({ maxSupply: 1 })
            unwrap(ledger.allowlist.add([ALICE]))
            unwrap(ledger.mint(ALICE, 1, PRICE))
            expect(ledger.phase).to.equal('SoldOut')

            const result = ledger.advanceToPublic()
            expect(result.ok).to.be.false
            if (!result.ok) expect(result.error).to.deep.equal({ kind: 'PhaseClosed', phase: 'SoldOut' })
        })
    })

    // ═══════════════════════════════════════════
    // Events
    // ═══════════════════════════════════════════

    describe('events', () => {
        it('records mints, the sell-out and allowlist changes in order', () => {
            const { ledger, clock } = newLedger({ maxSupply: 2 })
            unwrap(ledger.allowlist.add([ALICE, ALICE.toUpperCase().replace('0X', '0x')]))
            unwrap(ledger.mint(ALICE, 2, PRICE * 2n))

            const now = clock.now()
            expect(ledger.events.all()).to.deep.equal([
                { type: 'AllowlistUpdated', action: 'add', count: 1, seq: 1, timestamp: now },
                { type: 'MintRequested', tokenId: 1, to: ALICE, pricePaidWei: PRICE, seq: 2, timestamp: now },
                { type: 'MintRequested', tokenId: 2, to: ALICE, pricePaidWei: PRICE, seq: 3, timestamp: now },
                { type: 'PhaseAdvanced', from: 'Allowlist', to: 'SoldOut', seq: 4, timestamp: now },
            ])
        })

        it('emits each appended event', () => {
            const { ledger } = newLedger()
            const seen: string[] = []
            ledger.events.on('event', (e: { type: string }) => seen.push(e.type))
            unwrap(ledger.advanceToPublic())
            unwrap(ledger.mint(BOB, 1, PRICE))
            expect(seen).to.deep.equal(['PhaseAdvanced', 'MintRequested'])
        })
    })

    // ═══════════════════════════════════════════
    // Invariants under a long run
    // ═══════════════════════════════════════════

    it('holds supply invariants through a mixed sequence of calls', () => {
        const { ledger } = newLedger({ maxSupply: 40 })
        unwrap(ledger.allowlist.add([wallet(1), wallet(2), wallet(3)]))

        for (let i = 1; i <= 3; i++) {
            ledger.mint(wallet(i), 2, PRICE * 2n)
            expectInvariants(ledger)
        }
        unwrap(ledger.advanceToPublic())

        let n = 10
        while (ledger.phase !== 'SoldOut') {
            const quantity = (n % 5) + 1
            ledger.mint(wallet(n), quantity, PRICE * BigInt(quantity))
            expectInvariants(ledger)
            n++
        }

        expect(ledger.totalSupply()).to.equal(40)
        expect(ledger.tokenIds()).to.deep.equal(Array.from({ length: 40 }, (_, i) => i + 1))
    })
})
