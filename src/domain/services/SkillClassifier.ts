import skillCategories from '../../../assets/skill_categories.json';

export const OTHER_CATEGORY = 'Other';

export interface SkillCategoryTable {
    categories: Record<string, string[]>;
    ignoredLabels: string[];
}

/**
 * Assigns a category label to a skill name using a keyword table.
 * Exact matches win; otherwise a keyword appearing as a whole word inside
 * a longer name is used. Keywords of one or two characters only match exactly.
 */
export class SkillClassifier {
    private readonly exact = new Map<string, string>();
    private readonly partial: Array<{ pattern: RegExp; category: string }> = [];
    private readonly ignored: Set<string>;

    constructor(table: SkillCategoryTable = skillCategories) {
        for (const [category, keywords] of Object.entries(table.categories)) {
            for (const keyword of keywords) {
                const key = keyword.toLowerCase();
                if (!this.exact.has(key)) this.exact.set(key, category);
                if (key.length > 2) {
                    this.partial.push({
                        pattern: new RegExp(`(^|[^a-z0-9+#.])${escapeRegExp(key)}($|[^a-z0-9+#])`),
                        category,
                    });
                }
            }
        }
        this.ignored = new Set(table.ignoredLabels.map(label => label.toLowerCase()));
    }

    classify(name: string): string {
        const key = name.trim().toLowerCase();
        const exact = this.exact.get(key);
        if (exact) return exact;
        if (key.length <= 2) return OTHER_CATEGORY;

        const match = this.partial.find(entry => entry.pattern.test(key));
        return match ? match.category : OTHER_CATEGORY;
    }

    /**
     * True for page chrome captured as if it were a skill ("Show all", "Endorse").
     */
    isIgnoredLabel(name: string): boolean {
        const key = name.trim().toLowerCase();
        return this.ignored.has(key) || key.startsWith('show all');
    }
}

function escapeRegExp(text: string): string {
    return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
