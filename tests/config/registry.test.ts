import { describe, it, expect } from 'vitest';
import { CONFIG_KEYS, createRegistry, modeIgnoredKeys } from '../../src/config/registry.js';

describe('createRegistry', () => {
    it('declares the project path before the package name', () => {
        expect(CONFIG_KEYS.indexOf('project')).toBeLessThan(CONFIG_KEYS.indexOf('mainPackage'));
        expect(CONFIG_KEYS[0]).toBe('barebones');
    });

    it('maps keys to their command-line names', () => {
        const registry = createRegistry();
        expect(CONFIG_KEYS.map(key => registry[key].name)).toEqual([
            'barebones', 'path', 'desc', 'url', 'pkg', 'mit', 'authors', 'pym', 'pyM',
            'py_typed', 'pc_cron', 'add_deps', 'add_dev_deps', 'github', 'doctests',
        ]);
    });

    it('ignores CI, site and version-matrix keys in barebones mode', () => {
        expect(modeIgnoredKeys(createRegistry())).toEqual([
            'url', 'maxPythonVersion', 'scheduleHookUpdates', 'github', 'doctests',
        ]);
    });

    it('uses the git user as authors default', () => {
        expect(createRegistry({ gitUser: 'Ada <ada@example.com>' }).authors.defaultValue).toBe('Ada <ada@example.com>');
        expect(createRegistry().authors.defaultValue).toBeUndefined();
    });

    it('is frozen', () => {
        expect(Object.isFrozen(createRegistry())).toBe(true);
    });
});
