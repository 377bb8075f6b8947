/**
 * Unit Tests: TicketExtractor
 *
 * @see libs/attribution/ticketExtractor.ts
 */

import { describe, it } from 'node:test';
import assert from 'node:assert';
import { TicketExtractor, createTicketExtractor } from '../../libs/attribution/ticketExtractor.js';

describe('TicketExtractor', () => {
    const extractor = new TicketExtractor('([A-Z]+_[0-9]+)', 'https://tickets.example.com/browse');

    it('should replace underscores with hyphens in the captured id', () => {
        assert.strictEqual(extractor.extractTicketId('Apply TEST_1234 firewall rules'), 'TEST-1234');
    });

    it('should render the ticket URL', () => {
        const url = extractor.ticketUrl('Apply TEST_1234 firewall rules');
        assert.strictEqual(url, 'https://tickets.example.com/browse/TEST-1234');
        assert.ok(url?.endsWith('/TEST-1234'));
    });

    it('should strip trailing slashes from the base URL', () => {
        const slashed = new TicketExtractor('([A-Z]+_[0-9]+)', 'https://tickets.example.com/browse/');
        assert.strictEqual(slashed.ticketUrl('TEST_99'), 'https://tickets.example.com/browse/TEST-99');
    });

    it('should return null when nothing matches', () => {
        assert.strictEqual(extractor.extractTicketId('routine apply'), null);
        assert.strictEqual(extractor.ticketUrl('routine apply'), null);
    });

    it('should return null for an empty message', () => {
        assert.strictEqual(extractor.extractTicketId(null), null);
        assert.strictEqual(extractor.extractTicketId(''), null);
    });

    it('should return null when the pattern has no capture group', () => {
        const noGroup = new TicketExtractor('TEST_[0-9]+', 'https://tickets.example.com');
        assert.strictEqual(noGroup.extractTicketId('TEST_1'), null);
    });

    it('should search the whole message with a lazy prefix pattern', () => {
        const configured = new TicketExtractor('^.*?([a-zA-Z]{2,3}[-_][0-9]+).*', 'https://tickets.example.com');
        assert.strictEqual(configured.extractTicketId('ABC_123 update firewall'), 'ABC-123');
    });

    describe('createTicketExtractor', () => {
        it('should need both the pattern and the URL', () => {
            assert.strictEqual(createTicketExtractor('([A-Z]+_[0-9]+)', undefined), null);
            assert.strictEqual(createTicketExtractor(undefined, 'https://tickets.example.com'), null);
            assert.ok(createTicketExtractor('([A-Z]+_[0-9]+)', 'https://tickets.example.com') instanceof TicketExtractor);
        });
    });
});
