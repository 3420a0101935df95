import { describe, expect, it } from 'vitest';
import { InvalidTokenError } from '../../src/errors.js';
import { decodeToken, encodeToken } from '../../src/traversal/token-codec.js';

describe('encodeToken', () => {
    it('uses the short form when only the anchor is left', () => {
        expect(encodeToken({ anchorGroupId: 'root', frontier: [{ groupId: 'root', depth: 0 }] })).toBe('root:0');
    });

    it('lists frontier ids at one depth', () => {
        const frontier = [
            { groupId: 'a', depth: 2 },
            { groupId: 'b', depth: 2 },
        ];
        expect(encodeToken({ anchorGroupId: 'root', frontier })).toBe('root:2:a,b');
    });

    it('separates the next level with an empty element', () => {
        const frontier = [
            { groupId: 'a', depth: 1 },
            { groupId: 'b', depth: 1 },
            { groupId: 'c', depth: 2 },
        ];
        expect(encodeToken({ anchorGroupId: 'root', frontier })).toBe('root:1:a,b,,c');
    });

    it('refuses frontiers it cannot express', () => {
        expect(() => encodeToken({ anchorGroupId: 'root', frontier: [] })).toThrow(RangeError);
        expect(() =>
            encodeToken({
                anchorGroupId: 'root',
                frontier: [
                    { groupId: 'a', depth: 1 },
                    { groupId: 'b', depth: 3 },
                ],
            })
        ).toThrow(RangeError);
        expect(() =>
            encodeToken({
                anchorGroupId: 'root',
                frontier: [
                    { groupId: 'a', depth: 1 },
                    { groupId: 'b', depth: 2 },
                    { groupId: 'c', depth: 1 },
                ],
            })
        ).toThrow(RangeError);
    });
});

describe('decodeToken', () => {
    it('reads the short form as the anchor itself', () => {
        expect(decodeToken('pg-1:3')).toEqual({ anchorGroupId: 'pg-1', frontier: [{ groupId: 'pg-1', depth: 3 }] });
    });

    it('reads both levels of a list token', () => {
        expect(decodeToken('root:1:a,b,,c')).toEqual({
            anchorGroupId: 'root',
            frontier: [
                { groupId: 'a', depth: 1 },
                { groupId: 'b', depth: 1 },
                { groupId: 'c', depth: 2 },
            ],
        });
    });

    it('returns canonical tokens unchanged when re-encoded', () => {
        for (const token of ['root:0', 'root:2:x', 'root:1:a,b,,c,d', '3f1c2a7e-0000-1000-8000-00000000000a:0:9d1e.x_y']) {
            expect(encodeToken(decodeToken(token))).toBe(token);
        }
    });

    it.each([
        ['', 'empty'],
        ['root', 'no depth'],
        ['root:x', 'non-numeric depth'],
        ['root:-1', 'negative depth'],
        ['root:1:a:b', 'too many parts'],
        ['root:1:', 'empty id list'],
        ['root:1:a,,', 'trailing boundary'],
        ['root:1:,,a', 'leading boundary'],
        ['root:1:a,,b,,c', 'two boundaries'],
        ['ro ot:1', 'malformed anchor'],
        ['root:1:a;b', 'malformed child id'],
    ])('rejects %j (%s)', (token) => {
        expect(() => decodeToken(token)).toThrow(InvalidTokenError);
    });
});
