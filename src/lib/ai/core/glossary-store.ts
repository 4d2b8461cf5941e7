import { ConfigurationError } from './errors';
import { GlossaryTermSchema, type GlossaryTerm, type GlossaryTermInput } from '../types/glossary';
import type { GuidelineMatch, RegisteredGuideline } from '../types/guideline';

const escapeRegExp = (value: string) => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export class GlossaryStore {
  private terms: Map<string, GlossaryTerm> = new Map();

  constructor(terms: GlossaryTermInput[] = []) {
    terms.forEach(term => this.addTerm(term));
  }

  // Add term to glossary; names are unique, case-insensitive
  addTerm(input: GlossaryTermInput): GlossaryTerm {
    const term = Object.freeze(GlossaryTermSchema.parse(input));
    const key = term.name.toLowerCase();
    if (this.terms.has(key)) {
      throw new ConfigurationError(`Glossary term "${term.name}" already exists`);
    }
    this.terms.set(key, term);
    return term;
  }

  // Explicit update; terms already handed to an in-flight turn are untouched
  updateTerm(name: string, changes: Partial<Omit<GlossaryTermInput, 'name'>>): GlossaryTerm {
    const current = this.getTerm(name);
    if (!current) {
      throw new ConfigurationError(`Glossary term "${name}" does not exist`);
    }
    const updated = Object.freeze(GlossaryTermSchema.parse({ ...current, ...changes, name: current.name }));
    this.terms.set(current.name.toLowerCase(), updated);
    return updated;
  }

  upsertTerm(input: GlossaryTermInput): GlossaryTerm {
    return this.getTerm(input.name)
      ? this.updateTerm(input.name, input)
      : this.addTerm(input);
  }

  getTerm(name: string): GlossaryTerm | undefined {
    return this.terms.get(name.toLowerCase());
  }

  listTerms(): GlossaryTerm[] {
    return Array.from(this.terms.values());
  }

  // Terms whose name or a synonym appears as a whole word in the text
  findMentioned(text: string, terms: readonly GlossaryTerm[] = this.listTerms()): GlossaryTerm[] {
    return terms.filter(term =>
      [term.name, ...term.synonyms].some(label =>
        new RegExp(`(^|[^\\p{L}\\p{N}])${escapeRegExp(label)}($|[^\\p{L}\\p{N}])`, 'iu').test(text)
      )
    );
  }

  /**
   * Terms to attach to the oracle context: those mentioned in the message,
   * then those named by candidate guidelines, capped at maxTerms.
   */
  relevantTerms(
    message: string,
    guidelines: ReadonlyArray<RegisteredGuideline | GuidelineMatch> = [],
    maxTerms: number = 5,
    terms: readonly GlossaryTerm[] = this.listTerms()
  ): GlossaryTerm[] {
    const selected = new Map<string, GlossaryTerm>();
    this.findMentioned(message, terms).forEach(term => selected.set(term.name.toLowerCase(), term));

    const byName = new Map(terms.map(term => [term.name.toLowerCase(), term]));
    guidelines.forEach(entry => {
      const guideline = 'guideline' in entry ? entry.guideline : entry;
      (guideline.glossaryTerms ?? []).forEach(name => {
        const term = byName.get(name.toLowerCase());
        if (term) selected.set(term.name.toLowerCase(), term);
      });
    });

    return Array.from(selected.values()).slice(0, maxTerms);
  }

  // Build enriched context with terminology
  static buildEnrichedContext(terms: readonly GlossaryTerm[]): string {
    if (terms.length === 0) return '';

    return `\n\n## Relevant terminology:\n${terms
      .map(term => {
        const synonyms = term.synonyms.length > 0 ? ` (also: ${term.synonyms.join(', ')})` : '';
        return `- **${term.name}**${synonyms}: ${term.description}`;
      })
      .join('\n')}`;
  }
}
