/**
 * ScaffoldObserver — event formatting and handler selection.
 */
import { describe, it, expect, vi, afterEach } from 'vitest';
import {
    createScaffoldObserver,
    formatScaffoldEvent,
    shellQuote,
    SILENT_OBSERVER,
    type ScaffoldEvent,
} from '../../src/observability/ScaffoldObserver.js';

afterEach(() => {
    vi.restoreAllMocks();
});

describe('shellQuote', () => {
    it('leaves plain words untouched', () => {
        expect(shellQuote('git')).toBe('git');
        expect(shellQuote('--group')).toBe('--group');
        expect(shellQuote('git+https://github.com/x/y.git')).toBe('git+https://github.com/x/y.git');
    });

    it('quotes empty strings and whitespace', () => {
        expect(shellQuote('')).toBe(`''`);
        expect(shellQuote('initial commit')).toBe(`'initial commit'`);
    });

    it('escapes embedded single quotes', () => {
        expect(shellQuote(`it's`)).toBe(`'it'"'"'s'`);
    });
});

describe('formatScaffoldEvent', () => {
    const cases: Array<[ScaffoldEvent, string]> = [
        [{ type: 'mkdir', path: '/w/demo' }, '+ MKDIR /w/demo'],
        [{ type: 'write', path: '/w/demo/README.md' }, '+ WRITE /w/demo/README.md'],
        [{ type: 'touch', path: '/w/demo/CHANGELOG.md' }, '+ TOUCH /w/demo/CHANGELOG.md'],
        [{ type: 'symlink', path: '/w/demo/www/src/index.md', target: '../../README.md' },
            '+ SYMLINK /w/demo/www/src/index.md -> ../../README.md'],
        [{ type: 'chmod', path: '/w/demo/scripts/make_docs.py', mode: 0o755 }, '+ CHMOD+x /w/demo/scripts/make_docs.py'],
        [{ type: 'update', path: '/w/demo/mkdocs.yml' }, '+ UPDATE /w/demo/mkdocs.yml'],
        [{ type: 'run', argv: ['git', 'commit', '-m', 'first commit'], cwd: '/w/demo' },
            `+ RUN git commit -m 'first commit'`],
        [{ type: 'call', method: 'POST', endpoint: 'https://api.github.com/user/repos' },
            '+ CALL POST https://api.github.com/user/repos'],
        [{ type: 'info', message: 'done' }, 'done'],
    ];

    it.each(cases)('formats %j', (event, line) => {
        expect(formatScaffoldEvent(event)).toBe(line);
    });
});

describe('createScaffoldObserver', () => {
    it('forwards to a custom handler', () => {
        const events: ScaffoldEvent[] = [];
        const observer = createScaffoldObserver(event => events.push(event));

        observer({ type: 'info', message: 'hello' });

        expect(events).toEqual([{ type: 'info', message: 'hello' }]);
    });

    it('writes one line per event to stderr by default', () => {
        const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        const observer = createScaffoldObserver();

        observer({ type: 'info', message: 'all set' });
        observer({ type: 'mkdir', path: '/w/demo' });

        expect(write).toHaveBeenCalledTimes(2);
        expect(write).toHaveBeenNthCalledWith(1, 'all set\n');
        const second = String(write.mock.calls[1]?.[0]);
        expect(second).toContain('+ MKDIR /w/demo');
        expect(second.endsWith('\n')).toBe(true);
    });

    it('drops everything when silent', () => {
        const write = vi.spyOn(process.stderr, 'write').mockImplementation(() => true);
        SILENT_OBSERVER({ type: 'info', message: 'ignored' });
        expect(write).not.toHaveBeenCalled();
    });
});
