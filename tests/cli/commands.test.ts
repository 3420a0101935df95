import { describe, expect, it } from 'vitest';
import { parseCommand } from '../../src/cli/commands.js';

describe('parseCommand', () => {
    it('parses listing commands with defaults', () => {
        expect(parseCommand('list processors')).toEqual({ name: 'list', kind: 'processors', rootGroupId: 'root' });
        expect(parseCommand('  list Connection pg-1 2 ')).toEqual({ name: 'list', kind: 'connections', rootGroupId: 'pg-1', maxDepth: 2 });
        expect(parseCommand('more')).toEqual({ name: 'more' });
    });

    it('parses mutations', () => {
        expect(parseCommand('delete processor abc')).toEqual({
            name: 'mutate',
            request: { type: 'processor', id: 'abc', action: 'delete' },
        });
        expect(parseCommand('STOP process-group pg-1')).toEqual({
            name: 'mutate',
            request: { type: 'group', id: 'pg-1', action: 'stop' },
        });
    });

    it('parses queue and provenance commands', () => {
        expect(parseCommand('purge c1')).toEqual({ name: 'purge', connectionId: 'c1' });
        expect(parseCommand('queue c1')).toEqual({ name: 'queue', connectionId: 'c1' });
        expect(parseCommand('provenance p1')).toEqual({ name: 'provenance', componentId: 'p1', maxResults: 100 });
        expect(parseCommand('provenance p1 5')).toEqual({ name: 'provenance', componentId: 'p1', maxResults: 5 });
    });

    it('recognises help, exit and blank lines', () => {
        expect(parseCommand('')).toEqual({ name: 'empty' });
        expect(parseCommand('?')).toEqual({ name: 'help' });
        expect(parseCommand('quit')).toEqual({ name: 'exit' });
    });

    it('explains malformed input', () => {
        expect(parseCommand('list widgets')).toEqual({
            name: 'invalid',
            message: 'Usage: list <processors|connections|ports|groups> [groupId] [maxDepth]',
        });
        expect(parseCommand('list groups root deep')).toEqual({ name: 'invalid', message: 'maxDepth must be a non-negative integer' });
        expect(parseCommand('delete funnel f1')).toEqual({
            name: 'invalid',
            message: 'Usage: delete <processor|connection|port|group> <id>',
        });
        expect(parseCommand('provenance p1 0')).toEqual({ name: 'invalid', message: 'maxResults must be a positive integer' });
        expect(parseCommand('purge')).toEqual({ name: 'invalid', message: 'Usage: purge <connectionId>' });
        expect(parseCommand('frobnicate')).toEqual({
            name: 'invalid',
            message: 'Unknown command "frobnicate". Type "help" for a list of commands.',
        });
    });
});
