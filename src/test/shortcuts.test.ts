/**
 * Keyboard Shortcuts tests
 */

import { describe, it, expect } from 'vitest';
import { mapKeyToAction, getShortcutsByCategory, SHORTCUT_DEFINITIONS, type KeyInput } from '../core/shortcuts';

describe('shortcuts', () => {
    describe('mapKeyToAction', () => {
        const createEvent = (
            key: string,
            modifiers: { shift?: boolean; ctrl?: boolean; alt?: boolean } = {},
            targetTagName = 'BODY'
        ): KeyInput => ({
            key,
            shiftKey: modifiers.shift ?? false,
            ctrlKey: modifiers.ctrl ?? false,
            altKey: modifiers.alt ?? false,
            metaKey: false,
            targetTagName,
        });

        it('maps arrows to slice steps', () => {
            expect(mapKeyToAction(createEvent('ArrowUp'))).toBe('NEXT_SLICE');
            expect(mapKeyToAction(createEvent('ArrowDown'))).toBe('PREV_SLICE');
            expect(mapKeyToAction(createEvent('ArrowRight'))).toBe('NEXT_SLICE');
            expect(mapKeyToAction(createEvent('ArrowLeft'))).toBe('PREV_SLICE');
        });

        it('maps Shift+arrows to jumps', () => {
            expect(mapKeyToAction(createEvent('ArrowUp', { shift: true }))).toBe('JUMP_FWD');
            expect(mapKeyToAction(createEvent('ArrowDown', { shift: true }))).toBe('JUMP_BACK');
        });

        it('maps Home/End to first/last slice', () => {
            expect(mapKeyToAction(createEvent('Home'))).toBe('FIRST_SLICE');
            expect(mapKeyToAction(createEvent('End'))).toBe('LAST_SLICE');
        });

        it('maps letters case-insensitively', () => {
            expect(mapKeyToAction(createEvent('c'))).toBe('CENTER_CURSOR');
            expect(mapKeyToAction(createEvent('R'))).toBe('RESET_WINDOW');
            expect(mapKeyToAction(createEvent('a'))).toBe('AUTO_WINDOW');
        });

        it('maps function keys to presets', () => {
            expect(mapKeyToAction(createEvent('F1'))).toBe('WL_PRESET_1');
            expect(mapKeyToAction(createEvent('F5'))).toBe('WL_PRESET_5');
        });

        it('ignores keys while typing a slice number', () => {
            expect(mapKeyToAction(createEvent('ArrowUp', {}, 'INPUT'))).toBeNull();
        });

        it('ignores Ctrl/Alt combinations', () => {
            expect(mapKeyToAction(createEvent('r', { ctrl: true }))).toBeNull();
            expect(mapKeyToAction(createEvent('Home', { alt: true }))).toBeNull();
        });

        it('returns null for unmapped keys', () => {
            expect(mapKeyToAction(createEvent('q'))).toBeNull();
        });
    });

    describe('getShortcutsByCategory', () => {
        it('groups every definition once', () => {
            const groups = getShortcutsByCategory();
            expect([...groups.keys()]).toEqual(['navigation', 'window', 'general']);

            const total = [...groups.values()].reduce((sum, list) => sum + list.length, 0);
            expect(total).toBe(SHORTCUT_DEFINITIONS.length);
        });
    });
});
