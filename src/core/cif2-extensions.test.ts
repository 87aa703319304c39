/**
 * CIF2-only 手工映射测试
 */

import { describe, it, expect } from "vitest";
import { Cif2ExtensionTable } from "./cif2-extensions";

describe("Cif2ExtensionTable", () => {
  const table = new Cif2ExtensionTable();

  it("双向查询大小写不敏感", () => {
    expect(table.getCif1("_diffrn_source.device")).toBe("_diffrn_source");
    expect(table.getCif2("_DIFFRN_SOURCE")).toBe("_diffrn_source.device");
    expect(table.getCif1("_refine_diff.potential_rms")).toBe("_refine_diff_potential_RMS");
  });

  it("未收录的字段返回 null", () => {
    expect(table.getCif1("_cell.length_a")).toBeNull();
    expect(table.getCif2("_cell_length_a")).toBeNull();
    expect(table.isExtension("_cell_length_a")).toBe(false);
  });

  it("两种写法都视为扩展字段", () => {
    expect(table.isExtension("_exptl_crystal.mosaicity")).toBe(true);
    expect(table.isExtension("_exptl_crystal_mosaicity")).toBe(true);
  });

  it("接受自定义映射", () => {
    const custom = new Cif2ExtensionTable({ "_demo.value": "_demo_value" });
    expect(custom.size).toBe(1);
    expect(custom.getCif2("_demo_value")).toBe("_demo.value");
  });
});
