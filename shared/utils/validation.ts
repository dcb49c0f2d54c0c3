import { FAILURE_SENTINEL } from '../constants';

export function validateManifestRecord(record: unknown, idx: number): string[] {
    const errors: string[] = [];
    if (typeof record !== 'object' || record === null) {
        return [`Row ${idx + 1}: Invalid object`];
    }

    const row = record as Record<string, unknown>;

    // Required keys
    const required = ['theme', 'slide_number', 'label', 'visual', 'slide_text', 'image_v1', 'image_v2'];

    required.forEach(key => {
        if (!(key in row)) errors.push(`Row ${idx + 1}: Missing '${key}'`);
    });

    if (typeof row.slide_number !== 'string' || !/^\d+$/.test(row.slide_number) || Number(row.slide_number) < 1) {
        errors.push(`Row ${idx + 1}: 'slide_number' must be a positive integer`);
    }
    if (typeof row.slide_text === 'string' && row.slide_text.trim() === '') {
        errors.push(`Row ${idx + 1}: 'slide_text' must not be empty`);
    }
    if (typeof row.image_v1 === 'string' && row.image_v1.trim() === '') {
        errors.push(`Row ${idx + 1}: 'image_v1' must be a path or ${FAILURE_SENTINEL}`);
    }

    return errors;
}
