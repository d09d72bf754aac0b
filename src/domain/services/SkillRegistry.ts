import { SkillEntry } from '../entities/ProfileRecord';

/**
 * Case-insensitive set of skills. The first spelling seen is kept; a later
 * duplicate only raises the endorsement count.
 */
export class SkillRegistry {
    private readonly entries = new Map<string, SkillEntry>();

    add(name: string, endorsements?: number, category?: string): SkillEntry | null {
        const trimmed = name.replace(/\s+/g, ' ').trim();
        if (!trimmed) return null;
        if (endorsements !== undefined && (!Number.isInteger(endorsements) || endorsements < 0)) {
            endorsements = undefined;
        }

        const key = trimmed.toLowerCase();
        const existing = this.entries.get(key);
        if (!existing) {
            const entry: SkillEntry = { name: trimmed };
            if (endorsements !== undefined) entry.endorsements = endorsements;
            if (category) entry.category = category;
            this.entries.set(key, entry);
            return { ...entry };
        }

        if (endorsements !== undefined && (existing.endorsements === undefined || endorsements > existing.endorsements)) {
            existing.endorsements = endorsements;
        }
        if (!existing.category && category) {
            existing.category = category;
        }
        return { ...existing };
    }

    has(name: string): boolean {
        return this.entries.has(name.trim().toLowerCase());
    }

    get size(): number {
        return this.entries.size;
    }

    list(): SkillEntry[] {
        return Array.from(this.entries.values(), entry => ({ ...entry }));
    }
}
