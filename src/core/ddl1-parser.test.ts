/**
 * DDL1 词典解析器测试
 */

import { describe, it, expect } from "vitest";
import { Ddl1DictionaryParser, deriveCanonicalName } from "./ddl1-parser";
import { detectDictionaryFormat } from "./dictionary-format";

const DDL1_SAMPLE = [
  "data_on_this_dictionary",
  "    _dictionary_name            cif_test.dic",
  "    _dictionary_version         2.0",
  "    _dictionary_update          2020-01-01",
  "",
  "data_cell_[]",
  "    _name                       '_cell_[]'",
  "    _category                   category_overview",
  "    _type                       null",
  "",
  "data_cell_length_",
  "    loop_",
  "    _name",
  "        '_cell_length_a'",
  "        '_cell_length_b'",
  "    _category                   cell",
  "    _type                       numb",
  "    _units                      A",
  "    _definition",
  ";   Unit-cell lengths.",
  ";",
  "",
  "data_cell_measurement_temp",
  "    _name                       '_cell_measurement_temp'",
  "    _category                   cell_measurement",
  "    _type                       numb",
  "    _related_item               '_cell_measurement_temperature'",
  "    _related_function           replace",
  "",
  "data_cell_measurement_temperature",
  "    _name                       '_cell_measurement_temperature'",
  "    _category                   cell_measurement",
  "    _type                       numb",
  "",
].join("\n");

function parser(): Ddl1DictionaryParser {
  const instance = new Ddl1DictionaryParser("cif_test.dic", DDL1_SAMPLE);
  instance.parse();
  return instance;
}

describe("deriveCanonicalName", () => {
  it("以类别开头时在类别后加点", () => {
    expect(deriveCanonicalName("_refine_ls_R_factor_all", "refine_ls")).toBe("_refine_ls.R_factor_all");
    expect(deriveCanonicalName("_cell_length_a", "CELL")).toBe("_cell.length_a");
  });

  it("不以类别开头或没有类别时保持原样", () => {
    expect(deriveCanonicalName("_foo_bar", "cell")).toBe("_foo_bar");
    expect(deriveCanonicalName("_cell", "cell")).toBe("_cell");
    expect(deriveCanonicalName("_cell_volume", null)).toBe("_cell_volume");
  });
});

describe("Ddl1DictionaryParser", () => {
  it("样例被识别为 DDL1", () => {
    expect(detectDictionaryFormat(DDL1_SAMPLE)).toBe("DDL1");
  });

  it("读取 data_on_this_dictionary 元数据", () => {
    expect(parser().getDictionaryMetadata()).toEqual({
      title: "cif_test.dic",
      version: "2.0",
      date: "2020-01-01",
    });
  });

  it("循环中的多个名称各自成为定义", () => {
    const instance = parser();
    expect(instance.getCif2Field("_cell_length_a")).toBe("_cell.length_a");
    expect(instance.getCif2Field("_cell_length_b")).toBe("_cell.length_b");
    expect(instance.getFieldMetadata("_cell_length_b")?.description).toBe("Unit-cell lengths.");
    expect(instance.getFieldMetadata("_cell_length_a")?.units).toBe("A");
  });

  it("replace 关系解析为替代字段的规范名", () => {
    const instance = parser();
    expect(instance.isFieldDeprecated("_cell_measurement_temp")).toBe(true);
    expect(instance.isFieldDeprecated("_cell_measurement_temperature")).toBe(false);
    expect(instance.getCif2Field("_cell_measurement_temp")).toBe("_cell_measurement.temperature");
    expect(instance.getCif1Field("_cell_measurement.temperature")).toBe("_cell_measurement_temperature");
  });

  it("category_overview 块登记类别", () => {
    expect(parser().getCategories()).toEqual(["cell"]);
  });
});
