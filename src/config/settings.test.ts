import { describe, it, expect, vi, afterEach } from 'vitest';
import { ShellSettings, color_parse } from './settings.js';
import { EMPTY_CONFIG, type ShellConfig } from './schemas.js';

function config_make(shell: ShellConfig['shell'] = {}, launchers: ShellConfig['launchers'] = []): ShellConfig {
    return { shell, launchers };
}

afterEach((): void => {
    vi.restoreAllMocks();
});

describe('ShellSettings', (): void => {
    it('resolves defaults when no overrides exist', (): void => {
        const settings = new ShellSettings(EMPTY_CONFIG, {});
        expect(settings.locking_resolve()).toBe(true);
        expect(settings.locking_source()).toBe('default');
        expect(settings.panelColor_resolve()).toBe(0xaa000000);
        expect(settings.dataDir_resolve()).toBe('/usr/share/desktop-shell');
    });

    it('prefers env over the config file for locking', (): void => {
        const settings = new ShellSettings(config_make({ locking: true }), { DESKTOP_SHELL_LOCKING: 'off' });
        expect(settings.locking_resolve()).toBe(false);
        expect(settings.locking_source()).toBe('env');
    });

    it('falls back to the file when the env value is not a boolean', (): void => {
        const settings = new ShellSettings(config_make({ locking: false }), { DESKTOP_SHELL_LOCKING: 'maybe' });
        expect(settings.locking_resolve()).toBe(false);
        expect(settings.locking_source()).toBe('file');
    });

    it('reads panel colour from hex strings and ignores bad env values', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const settings = new ShellSettings(config_make({ 'panel-color': '0xff336699' }), {
            DESKTOP_SHELL_PANEL_COLOR: 'purple'
        });
        expect(settings.panelColor_resolve()).toBe(0xff336699);
        expect(warn).toHaveBeenCalledWith('[settings] invalid DESKTOP_SHELL_PANEL_COLOR "purple", ignoring');
    });

    it('isolates background images per user', (): void => {
        const settings = new ShellSettings(config_make({
            'background-image': '/img/shared.png',
            'background-image-alice': '/img/alice.png'
        }), {});
        expect(settings.background_resolve('alice').image).toBe('/img/alice.png');
        expect(settings.background_source('alice')).toBe('user');
        expect(settings.background_resolve('bob').image).toBe('/img/shared.png');
        expect(settings.background_source('bob')).toBe('file');
    });

    it('uses the data-dir pattern when no image is configured', (): void => {
        const settings = new ShellSettings(config_make({ 'data-dir': '/opt/shell' }), {});
        expect(settings.background_resolve('alice')).toEqual({
            image: '/opt/shell/pattern.png',
            color: 0,
            type: 'tile'
        });
        expect(settings.background_source('alice')).toBe('default');
    });

    it('falls back to the shared colour when the user colour is zero', (): void => {
        const settings = new ShellSettings(config_make({
            'background-color': 0xff112233,
            'background-color-alice': 0,
            'background-color-bob': '0xff445566'
        }), {});
        expect(settings.background_resolve('alice').color).toBe(0xff112233);
        expect(settings.background_resolve('bob').color).toBe(0xff445566);
    });

    it('turns an unknown background-type into none with a warning', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const settings = new ShellSettings(config_make({ 'background-type': 'stretch' }), {});
        expect(settings.background_resolve('alice').type).toBe('none');
        expect(warn).toHaveBeenCalledWith('[settings] invalid background-type: stretch');
    });

    it('collects generic and user-scoped launchers, skipping incomplete ones', (): void => {
        const warn = vi.spyOn(console, 'warn').mockImplementation((): void => {});
        const settings = new ShellSettings(config_make({}, [
            { icon: '/icons/term.png', path: '/usr/bin/term' },
            { icon: '/icons/mail.png', path: '/usr/bin/mail', user: 'alice' },
            { icon: '/icons/broken.png' }
        ]), {});

        expect(settings.launchers_resolve('alice')).toEqual([
            { icon: '/icons/term.png', path: '/usr/bin/term' },
            { icon: '/icons/mail.png', path: '/usr/bin/mail' }
        ]);
        expect(settings.launchers_resolve('bob')).toEqual([
            { icon: '/icons/term.png', path: '/usr/bin/term' }
        ]);
        expect(warn).toHaveBeenCalledWith('[settings] invalid launcher section: icon and path are required');
    });

    it('falls back to the terminal launcher', (): void => {
        const settings = new ShellSettings(EMPTY_CONFIG, { DESKTOP_SHELL_DATADIR: '/data' });
        expect(settings.launchers_resolve('alice')).toEqual([
            { icon: '/data/terminal.png', path: '/usr/bin/x-terminal-emulator' }
        ]);
    });
});

describe('color_parse', (): void => {
    it('accepts hex, decimal and numeric forms', (): void => {
        expect(color_parse('0xFF000000')).toBe(0xff000000);
        expect(color_parse('255')).toBe(255);
        expect(color_parse(16)).toBe(16);
    });

    it('rejects out-of-range and malformed values', (): void => {
        expect(color_parse('0x1ffffffff')).toBeNull();
        expect(color_parse(-1)).toBeNull();
        expect(color_parse('blue')).toBeNull();
        expect(color_parse(1.5)).toBeNull();
    });
});
