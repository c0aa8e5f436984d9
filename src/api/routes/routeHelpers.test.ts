import {
  nullableString,
  optionalBoolean,
  optionalNumber,
  optionalStringArray,
  statusCodeFor,
} from "./routeHelpers";

describe("request body coercion", () => {
  it("accepts numbers and numeric strings", () => {
    expect(optionalNumber(3)).toBe(3);
    expect(optionalNumber("12")).toBe(12);
    expect(optionalNumber("")).toBeUndefined();
    expect(optionalNumber("abc")).toBeUndefined();
  });

  it("distinguishes clearing a reference from leaving it unchanged", () => {
    expect(nullableString(null)).toBeNull();
    expect(nullableString("")).toBeNull();
    expect(nullableString(undefined)).toBeUndefined();
    expect(nullableString("period-1")).toBe("period-1");
  });

  it("parses booleans sent as strings", () => {
    expect(optionalBoolean("true")).toBe(true);
    expect(optionalBoolean(false)).toBe(false);
    expect(optionalBoolean("yes")).toBeUndefined();
  });

  it("keeps only string entries of an array", () => {
    expect(optionalStringArray(["a", 1, "b"])).toEqual(["a", "b"]);
    expect(optionalStringArray("a")).toBeUndefined();
  });
});

describe("statusCodeFor", () => {
  it("maps result outcomes to HTTP statuses", () => {
    expect(statusCodeFor({ success: true })).toBe(200);
    expect(statusCodeFor({ success: false, errorKind: "not_found" })).toBe(404);
    expect(statusCodeFor({ success: false, errorKind: "precondition" })).toBe(400);
    expect(statusCodeFor({ success: false, errorKind: "unexpected" })).toBe(500);
  });
});
