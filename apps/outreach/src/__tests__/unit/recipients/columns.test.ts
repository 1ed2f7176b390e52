import { describe, it, expect } from "vitest";
import { describeField, fieldForHeader, missingFields, normalizeHeader } from "../../../recipients/columns.js";

describe("normalizeHeader", () => {
  it("should lowercase, trim and join words with underscores", () => {
    expect(normalizeHeader("  Recruiter Email ")).toBe("recruiter_email");
    expect(normalizeHeader("\uFEFFName")).toBe("name");
  });
});

describe("fieldForHeader", () => {
  it.each([
    ["Name", "name"],
    ["Recruiter Name", "name"],
    ["FULL_NAME", "name"],
    ["Company", "company"],
    ["company name", "company"],
    ["Organization", "company"],
    ["Email", "email"],
    ["Recruiter_Email", "email"],
    ["Email Address", "email"],
  ])("maps %s to %s", (header, field) => {
    expect(fieldForHeader(header)).toBe(field);
  });

  it("should ignore unknown columns", () => {
    expect(fieldForHeader("Phone")).toBeNull();
    expect(fieldForHeader("")).toBeNull();
  });
});

describe("missingFields", () => {
  it("should require name, company and email columns", () => {
    expect(missingFields(["name", null, "company"])).toEqual(["email"]);
    expect(missingFields(["email"])).toEqual(["name", "company"]);
    expect(missingFields(["email", "company", "name"])).toEqual([]);
  });

  it("should describe the accepted headers", () => {
    expect(describeField("email")).toBe("email (one of: email, recruiter_email, email_address)");
  });
});
