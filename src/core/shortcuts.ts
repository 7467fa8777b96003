/**
 * Keyboard Shortcuts
 * Single source of truth for shortcut mapping and help display
 */

export type ShortcutAction =
    | 'PREV_SLICE'
    | 'NEXT_SLICE'
    | 'JUMP_BACK'
    | 'JUMP_FWD'
    | 'FIRST_SLICE'
    | 'LAST_SLICE'
    | 'CENTER_CURSOR'
    | 'RESET_WINDOW'
    | 'AUTO_WINDOW'
    | 'WL_PRESET_1'
    | 'WL_PRESET_2'
    | 'WL_PRESET_3'
    | 'WL_PRESET_4'
    | 'WL_PRESET_5'
    | 'TOGGLE_HELP'
    | null;

/** The parts of a KeyboardEvent the mapping reads */
export interface KeyInput {
    key: string;
    shiftKey: boolean;
    ctrlKey: boolean;
    altKey: boolean;
    metaKey: boolean;
    /** Tag name of the focused element, e.g. 'INPUT' */
    targetTagName?: string;
}

/** Shortcut definition for help display */
export interface ShortcutDefinition {
    /** Display key (e.g., "Home", "↑/↓") */
    key: string;
    /** Optional modifier (e.g., "Shift") */
    modifier?: string;
    description: string;
    category: 'navigation' | 'window' | 'general';
}

export const SHORTCUT_DEFINITIONS: ShortcutDefinition[] = [
    // Navigation
    { key: '↑ / ↓', description: 'Previous / Next slice', category: 'navigation' },
    { key: '↑ / ↓', modifier: 'Shift', description: 'Jump 10 slices', category: 'navigation' },
    { key: 'Home / End', description: 'First / Last slice', category: 'navigation' },
    { key: 'C', description: 'Center crosshair in volume', category: 'navigation' },
    { key: 'Right-drag', description: 'Scrub slices (drag up/down)', category: 'navigation' },
    { key: 'Right-drag', modifier: 'Shift', description: 'Scrub slices 5× faster', category: 'navigation' },

    // Window
    { key: 'R', description: 'Reset window to full range', category: 'window' },
    { key: 'A', description: 'Auto window (1st-99th percentile)', category: 'window' },
    { key: 'F1-F5', description: 'Window presets (Full/Soft/Hi-C/Bright/Dark)', category: 'window' },

    // General
    { key: '?', description: 'Show keyboard shortcuts', category: 'general' },
];

export function mapKeyToAction(e: KeyInput): ShortcutAction {
    // Ignore if a text field is focused (numeric slice entry)
    if (e.targetTagName === 'INPUT' || e.targetTagName === 'TEXTAREA') return null;

    if (e.ctrlKey || e.altKey || e.metaKey) return null;

    switch (e.key) {
        case 'ArrowLeft':
        case 'ArrowDown':
            return e.shiftKey ? 'JUMP_BACK' : 'PREV_SLICE';

        case 'ArrowRight':
        case 'ArrowUp':
            return e.shiftKey ? 'JUMP_FWD' : 'NEXT_SLICE';

        case 'Home': return 'FIRST_SLICE';
        case 'End': return 'LAST_SLICE';

        case 'c':
        case 'C': return 'CENTER_CURSOR';

        case 'r':
        case 'R': return 'RESET_WINDOW';

        case 'a':
        case 'A': return 'AUTO_WINDOW';

        case 'F1': return 'WL_PRESET_1';
        case 'F2': return 'WL_PRESET_2';
        case 'F3': return 'WL_PRESET_3';
        case 'F4': return 'WL_PRESET_4';
        case 'F5': return 'WL_PRESET_5';

        case '?': return 'TOGGLE_HELP';
    }

    return null;
}

/**
 * Get shortcuts grouped by category for help display
 */
export function getShortcutsByCategory(): Map<ShortcutDefinition['category'], ShortcutDefinition[]> {
    const groups = new Map<ShortcutDefinition['category'], ShortcutDefinition[]>([
        ['navigation', []],
        ['window', []],
        ['general', []],
    ]);

    for (const shortcut of SHORTCUT_DEFINITIONS) {
        groups.get(shortcut.category)?.push(shortcut);
    }

    return groups;
}
