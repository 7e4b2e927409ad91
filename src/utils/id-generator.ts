/**
 * Unique ID Generator
 * Generates random lowercase alphanumeric IDs using short-unique-id
 */

import ShortUniqueId from "short-unique-id";

export class IdGenerator {
  private uid: ShortUniqueId;
  private usedIds = new Set<string>();

  constructor(length = 12) {
    this.uid = new ShortUniqueId({
      length,
      dictionary: "alphanum_lower",
    });
  }

  /**
   * Generate an ID this generator has not handed out before
   */
  generate(): string {
    let id: string;
    do {
      id = this.uid.rnd();
    } while (this.usedIds.has(id));

    this.usedIds.add(id);
    return id;
  }
}
