import { JsonObject } from '../kubernetes/utils/StructuralMerge.js';
import { Element } from './Element.js';

/**
 * A group of elements keyed by piggyback host name.
 */
export class Group {
  private readonly elements = new Map<string, Element>();

  public get(elementName: string): Element {
    let element = this.elements.get(elementName);
    if (!element) {
      element = new Element();
      this.elements.set(elementName, element);
    }
    return element;
  }

  /**
   * Insert each host's data into that host's `sectionName` section, creating
   * the element and section on first use.
   */
  public join(sectionName: string, pairs: ReadonlyMap<string, JsonObject>): this {
    for (const [elementName, data] of pairs) {
      this.get(elementName).get(sectionName).insert(data);
    }
    return this;
  }

  public elementNames(): string[] {
    return [...this.elements.keys()];
  }

  public output(): string[] {
    const lines: string[] = [];
    for (const [name, element] of this.elements) {
      lines.push(`<<<<${name}>>>>`);
      lines.push(...element.output());
      lines.push('<<<<>>>>');
    }
    return lines;
  }
}
