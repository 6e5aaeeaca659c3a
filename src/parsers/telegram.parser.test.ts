import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { describe, expect, it } from 'vitest';

import { ParseError } from '../utils/errors';
import { parseTelegramExport } from './telegram.parser';

const FIXTURE = fileURLToPath(new URL('../../fixtures/sample-export.json', import.meta.url));

function encode(value: unknown): Buffer {
    return Buffer.from(typeof value === 'string' ? value : JSON.stringify(value), 'utf8');
}

describe('parseTelegramExport', () => {
    it('parses the conversation header', () => {
        const archive = parseTelegramExport(readFileSync(FIXTURE));

        expect(archive.name).toBe('Book Club');
        expect(archive.type).toBe('private_group');
        expect(archive.id).toBe(4815162342n);
        expect(archive.messages.map((m) => m.id)).toEqual([1n, 2n, 3n, 4n, 5n]);
    });

    it('reads message fields and flattens text', () => {
        const [first, , third] = parseTelegramExport(readFileSync(FIXTURE)).messages;

        expect(first).toEqual({
            id: 1n,
            type: 'message',
            date: '2023-03-14T02:05:00',
            from: 'Alice',
            fromID: 'user1001',
            text: { kind: 'plain', value: 'Hi Hi' },
            textContent: 'Hi Hi'
        });
        expect(third.text).toEqual({ kind: 'rich', segments: ['Read ', 'Dune', ' next'] });
        expect(third.textContent).toBe('Read Dune next');
    });

    it('ignores unknown fields', () => {
        const archive = parseTelegramExport(readFileSync(FIXTURE));

        expect(Object.keys(archive).sort()).toEqual(['id', 'messages', 'name', 'type']);
        expect(Object.keys(archive.messages[0]).sort()).toEqual([
            'date',
            'from',
            'fromID',
            'id',
            'text',
            'textContent',
            'type'
        ]);
    });

    it('defaults missing fields to their zero value', () => {
        const service = parseTelegramExport(readFileSync(FIXTURE)).messages[3];
        expect(service.from).toBe('');
        expect(service.fromID).toBe('');
        expect(service.textContent).toBe('');

        const empty = parseTelegramExport(encode({}));
        expect(empty).toEqual({ name: '', type: '', id: 0n, messages: [] });

        const [bare] = parseTelegramExport(encode({ messages: [{}] })).messages;
        expect(bare).toEqual({
            id: 0n,
            type: '',
            date: '',
            from: '',
            fromID: '',
            text: { kind: 'empty' },
            textContent: ''
        });
    });

    it('treats null like a missing field', () => {
        const archive = parseTelegramExport(
            encode({ name: null, id: null, messages: [{ id: 7, from: null, text: null }] })
        );
        expect(archive.name).toBe('');
        expect(archive.id).toBe(0n);
        expect(archive.messages[0].from).toBe('');
        expect(archive.messages[0].text).toEqual({ kind: 'empty' });
    });

    it('reads 64-bit ids written as strings', () => {
        const archive = parseTelegramExport(encode('{"id": "9007199254740993", "messages": [{"id": "-12"}]}'));
        expect(archive.id).toBe(9007199254740993n);
        expect(archive.messages[0].id).toBe(-12n);
    });

    it('accepts fromID as well as from_id', () => {
        const [message] = parseTelegramExport(encode({ messages: [{ fromID: 'user42' }] })).messages;
        expect(message.fromID).toBe('user42');
    });

    it('skips a leading byte-order mark', () => {
        const withBom = Buffer.concat([Buffer.from([0xef, 0xbb, 0xbf]), encode({ name: 'Notes' })]);
        expect(parseTelegramExport(withBom).name).toBe('Notes');
    });

    it('accepts a plain Uint8Array', () => {
        const bytes = new Uint8Array(encode({ name: 'Bytes' }));
        expect(parseTelegramExport(bytes).name).toBe('Bytes');
    });

    it('returns a frozen message list', () => {
        expect(Object.isFrozen(parseTelegramExport(readFileSync(FIXTURE)).messages)).toBe(true);
    });

    it('fails on bytes that are not UTF-8', () => {
        const corrupt = Buffer.concat([Buffer.from('{"name":"a'), Buffer.from([0xff, 0xfe]), Buffer.from('"}')]);
        expect(() => parseTelegramExport(corrupt)).toThrow(ParseError);
        expect(() => parseTelegramExport(corrupt)).toThrow('Invalid UTF-8 in export file');
    });

    it('accepts the 64-bit integer bounds', () => {
        const archive = parseTelegramExport(
            encode('{"id": "9223372036854775807", "messages": [{"id": "-9223372036854775808"}]}')
        );
        expect(archive.id).toBe(9223372036854775807n);
        expect(archive.messages[0].id).toBe(-9223372036854775808n);
    });

    it('fails on ids outside the 64-bit range', () => {
        expect(() => parseTelegramExport(encode('{"id": "99999999999999999999999"}'))).toThrow(ParseError);
        expect(() => parseTelegramExport(encode('{"id": "9223372036854775808"}'))).toThrow(
            /id: Integer out of 64-bit range/
        );
        expect(() => parseTelegramExport(encode('{"messages": [{"id": "-9223372036854775809"}]}'))).toThrow(
            /messages\.0\.id: Integer out of 64-bit range/
        );
    });

    it('fails on malformed JSON', () => {
        expect(() => parseTelegramExport(encode('{"name": "Book Club",'))).toThrow(ParseError);
        expect(() => parseTelegramExport(encode('{"name": "Book Club",'))).toThrow(/^Invalid JSON: /);
    });

    it('fails when the document is not an object', () => {
        expect(() => parseTelegramExport(encode([1, 2]))).toThrow(ParseError);
        expect(() => parseTelegramExport(encode([1, 2]))).toThrow(/\(root\): /);
    });

    it('fails on a type mismatch and names the field', () => {
        expect(() => parseTelegramExport(encode({ name: 5 }))).toThrow(ParseError);
        expect(() => parseTelegramExport(encode({ name: 5 }))).toThrow(/name: /);
        expect(() => parseTelegramExport(encode({ messages: [{ id: 'abc' }] }))).toThrow(/messages\.0\.id: /);
        expect(() => parseTelegramExport(encode({ messages: [{ id: 1.5 }] }))).toThrow(ParseError);
        expect(() => parseTelegramExport(encode({ messages: {} }))).toThrow(/messages: /);
    });
});
