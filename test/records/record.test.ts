import { describe, expect, it } from "vitest"

import {
  RECORD_COLUMNS,
  parseRawRecord,
  resolveHeader,
  toCsvRow,
  toDisplayRow,
  toServiceFlag,
} from "../../src/records/record.js"
import { makeRecord } from "../helpers/records.js"

describe("parseRawRecord", () => {
  it("normalizes producer output and fills defaults", () => {
    const result = parseRawRecord({
      name: "  Smile Dental ",
      address: "12 Beach Rd",
      phone_number: 4412345,
      reviews_count: "(1,204)",
      reviews_average: "4.6 stars",
      store_delivery: true,
      in_store_pickup: "yes",
    })

    expect(result).toEqual({
      success: true,
      record: {
        name: "Smile Dental",
        address: "12 Beach Rd",
        website: "",
        phone_number: "4412345",
        reviews_count: 1204,
        reviews_average: 4.6,
        store_shopping: "No",
        in_store_pickup: "Yes",
        store_delivery: "Yes",
        place_type: "",
        opens_at: "",
        introduction: "",
      },
    })
  })

  it("accepts a record that only has a name", () => {
    const result = parseRawRecord({ name: "Smile Dental" })

    expect(result).toEqual({
      success: true,
      record: {
        name: "Smile Dental",
        address: "",
        website: "",
        phone_number: "",
        reviews_count: null,
        reviews_average: null,
        store_shopping: "No",
        in_store_pickup: "No",
        store_delivery: "No",
        place_type: "",
        opens_at: "",
        introduction: "",
      },
    })
  })

  it("rejects a record without a name", () => {
    const result = parseRawRecord({ name: "   ", address: "12 Beach Rd" })
    expect(result).toEqual({ success: false, message: "name: Record name is required" })
  })

  it("freezes accepted records", () => {
    const result = parseRawRecord({ name: "Smile Dental" })
    expect(result.success && Object.isFrozen(result.record)).toBe(true)
  })
})

describe("resolveHeader", () => {
  it("matches record columns regardless of case and separators", () => {
    expect(resolveHeader(["NAME", "phone-number", "Opens At", "notes"])).toEqual([
      "name",
      "phone_number",
      "opens_at",
      null,
    ])
  })

  it("falls back to a cell containing the identity column name", () => {
    expect(resolveHeader(["Business Name", "Full Address", "City"])).toEqual([
      "name",
      "address",
      null,
    ])
  })

  it("prefers an exact column over a containing one", () => {
    expect(resolveHeader(["business_name", "name", "address"])).toEqual([null, "name", "address"])
  })

  it("claims each record column once", () => {
    expect(resolveHeader(["name", "Name"])).toEqual(["name", null])
  })
})

describe("toServiceFlag", () => {
  it("maps truthy markers to Yes and everything else to No", () => {
    expect(toServiceFlag(true)).toBe("Yes")
    expect(toServiceFlag("Available")).toBe("Yes")
    expect(toServiceFlag(1)).toBe("Yes")
    expect(toServiceFlag("no")).toBe("No")
    expect(toServiceFlag(undefined)).toBe("No")
  })
})

describe("CSV projection", () => {
  const record = makeRecord("Smile Dental", "12 Beach Rd", {
    reviews_count: 120,
    reviews_average: 4.5,
    store_delivery: "Yes",
  })

  it("follows the default column order", () => {
    expect(toCsvRow(record, RECORD_COLUMNS)).toEqual([
      "Smile Dental",
      "12 Beach Rd",
      "",
      "",
      "120",
      "4.5",
      "No",
      "No",
      "Yes",
      "",
      "",
      "",
    ])
  })

  it("follows a foreign header and leaves unknown columns empty", () => {
    const layout = resolveHeader(["reviews_count", "notes", "name"])
    expect(toCsvRow(record, layout)).toEqual(["120", "", "Smile Dental"])
  })

  it("keeps the data under a capitalised header", () => {
    const layout = resolveHeader(["Name", " Address ", "Phone Number", "Reviews-Count"])
    expect(toCsvRow(record, layout)).toEqual(["Smile Dental", "12 Beach Rd", "", "120"])
  })

  it("renders missing numbers as empty cells", () => {
    const row = toDisplayRow(makeRecord("Tooth Care", "Main Rd"))
    expect(row.reviews_count).toBe("")
    expect(row.name).toBe("Tooth Care")
    expect(Object.keys(row)).toEqual([...RECORD_COLUMNS])
  })
})
