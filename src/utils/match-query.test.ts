import { describe, it, expect } from "vitest";
import { matchesQuery } from "./match-query";
import { entity } from "../testing/fixtures";

const course = entity("course.pl-200t00", {
  type: "courses",
  title: "Configure the Power Platform",
  summary: "Learn to build solutions",
  courseNumber: "PL-200T00",
});

describe("matchesQuery", () => {
  it("matches title substrings case-insensitively", () => {
    expect(matchesQuery(course, "power PLATFORM")).toBe(true);
  });

  it("matches summary, UID and course number", () => {
    expect(matchesQuery(course, "build solutions")).toBe(true);
    expect(matchesQuery(course, "course.pl")).toBe(true);
    expect(matchesQuery(course, "pl-200t")).toBe(true);
  });

  it("matches a query without hyphens against a hyphenated field", () => {
    expect(matchesQuery(course, "PL200")).toBe(true);
  });

  it("matches a hyphenated query against an unhyphenated field", () => {
    const path = entity("learn.az400-intro", { title: "AZ400 essentials" });
    expect(matchesQuery(path, "AZ-400")).toBe(true);
  });

  it("rejects unrelated queries", () => {
    expect(matchesQuery(course, "kubernetes")).toBe(false);
  });

  it("does not fall back to normalized matching for punctuation-only queries", () => {
    expect(matchesQuery(course, "?!")).toBe(false);
  });
});
