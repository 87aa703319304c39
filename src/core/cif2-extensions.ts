/**
 * CIF2-only 字段的手工 CIF1 映射
 *
 * 官方词典中有些字段只有点分写法、没有任何 CIF1 别名，
 * 但下游软件仍需要旧写法；这里补上固定映射，作为双向查询的兜底。
 */

import bundledMappings from "../../resources/cif2-only-mappings.json";

export class Cif2ExtensionTable {
  /** 小写 CIF2 名 → CIF1 名 */
  private readonly toCif1 = new Map<string, string>();
  /** 小写 CIF1 名 → CIF2 名 */
  private readonly toCif2 = new Map<string, string>();

  constructor(mappings: Record<string, string> = bundledMappings.mappings) {
    for (const [cif2, cif1] of Object.entries(mappings)) {
      this.toCif1.set(cif2.toLowerCase(), cif1);
      this.toCif2.set(cif1.toLowerCase(), cif2);
    }
  }

  getCif1(name: string): string | null {
    return this.toCif1.get(name.toLowerCase()) ?? null;
  }

  getCif2(name: string): string | null {
    return this.toCif2.get(name.toLowerCase()) ?? null;
  }

  isExtension(name: string): boolean {
    const lower = name.toLowerCase();
    return this.toCif1.has(lower) || this.toCif2.has(lower);
  }

  get size(): number {
    return this.toCif1.size;
  }
}
