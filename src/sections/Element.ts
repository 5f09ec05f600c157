import { Section } from './Section.js';

/**
 * An element bundles the sections reported for one host.
 */
export class Element {
  private readonly sections = new Map<string, Section>();

  public get(sectionName: string): Section {
    let section = this.sections.get(sectionName);
    if (!section) {
      section = new Section();
      this.sections.set(sectionName, section);
    }
    return section;
  }

  public sectionNames(): string[] {
    return [...this.sections.keys()];
  }

  public output(): string[] {
    const lines: string[] = [];
    for (const [name, section] of this.sections) {
      lines.push(`<<<${name}:sep(0)>>>`);
      lines.push(section.output());
    }
    return lines;
  }
}
