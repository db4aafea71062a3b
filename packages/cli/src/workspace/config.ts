import { readFileSync, existsSync } from 'node:fs';
import { parse } from 'yaml';
import { TallyConfigSchema, type TallyConfig } from '@tally/shared';

/**
 * Loads tally.yaml. A missing or empty file gives the defaults.
 */
export function loadConfig(path: string): TallyConfig {
    if (!existsSync(path)) {
        return TallyConfigSchema.parse({});
    }
    const content = readFileSync(path, 'utf-8');
    const data: unknown = parse(content);

    const result = TallyConfigSchema.safeParse(data ?? {});
    if (!result.success) {
        const issues = result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`);
        throw new Error(`Invalid config ${path}: ${issues.join('; ')}`);
    }
    return result.data;
}
