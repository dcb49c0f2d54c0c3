import { CHARACTER_CLASSES, MONTH_NAMES } from '../constants';
import type { SlideTemplate, TemplateKind } from '../types';

const MONTH_TEMPLATE: SlideTemplate = {
    kind: 'month',
    expectedSlides: 1 + MONTH_NAMES.length,
    itemLabel: 'Month',
    guideline: `Slide 1 is the title card. Slides 2-13 correspond to ${MONTH_NAMES[0]}-${MONTH_NAMES[11]}, in calendar order.`,
    fallbackLabels: ['Title Card', ...MONTH_NAMES],
};

const CLASS_TEMPLATE: SlideTemplate = {
    kind: 'class',
    expectedSlides: 1 + CHARACTER_CLASSES.length,
    itemLabel: 'Class',
    guideline: `Slide 1 is the title card. Slides 2-${1 + CHARACTER_CLASSES.length} each feature one tabletop RPG character class: ${CHARACTER_CLASSES.join(', ')}.`,
    fallbackLabels: ['Title Card'],
};

const GENERIC_TEMPLATE: SlideTemplate = {
    kind: 'generic',
    expectedSlides: 13,
    itemLabel: 'Concept',
    guideline: 'Slide 1 is the title card. Slides 2-13 each feature one distinct concept that fits the theme, chosen by you.',
    fallbackLabels: ['Title Card'],
};

export function detectTemplateKind(theme: string): TemplateKind {
    const lower = theme.toLowerCase();
    // "birth month" contains "month"; "classes" contains "class"
    if (lower.includes('month')) return 'month';
    if (lower.includes('class')) return 'class';
    return 'generic';
}

export function getTemplate(kind: TemplateKind): SlideTemplate {
    switch (kind) {
        case 'month':
            return MONTH_TEMPLATE;
        case 'class':
            return CLASS_TEMPLATE;
        case 'generic':
            return GENERIC_TEMPLATE;
        default: {
            const unreachable: never = kind;
            throw new Error(`Unknown template kind: ${String(unreachable)}`);
        }
    }
}

export function classifyTheme(theme: string): SlideTemplate {
    return getTemplate(detectTemplateKind(theme));
}
