// @vitest-environment node
import { describe, it, expect } from "vitest";
import { z } from "zod";
import { describeFieldErrors, extractZodFieldErrors, validateWithSchema } from "./validation";

const schema = z
  .object({
    title: z.string().min(1, "Title is required").max(5, "Title is too long"),
    tags: z.array(z.string().min(1, "Tag is empty")),
  })
  .refine((value) => value.tags.length < 3, "Too many tags");

describe("extractZodFieldErrors", () => {
  it("keeps the first message per top-level field", () => {
    const result = schema.safeParse({ title: "", tags: ["", ""] });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(extractZodFieldErrors(result.error)).toEqual({
      title: "Title is required",
      tags: "Tag is empty",
    });
  });

  it("keys issues without a path as form", () => {
    const result = schema.safeParse({ title: "ok", tags: ["a", "b", "c"] });
    expect(result.success).toBe(false);
    if (result.success) return;

    expect(extractZodFieldErrors(result.error)).toEqual({ form: "Too many tags" });
  });
});

describe("describeFieldErrors", () => {
  it("renders one line per field", () => {
    expect(describeFieldErrors({ title: "Title is required", form: "Too many tags" })).toEqual([
      "title: Title is required",
      "form: Too many tags",
    ]);
  });
});

describe("validateWithSchema", () => {
  it("returns parsed data on success", () => {
    expect(validateWithSchema(schema, { title: "ok", tags: ["a"] }, "post")).toEqual({
      success: true,
      data: { title: "ok", tags: ["a"] },
    });
  });

  it("returns field errors on failure", () => {
    expect(validateWithSchema(schema, { title: "too long", tags: [] }, "post")).toEqual({
      success: false,
      fieldErrors: { title: "Title is too long" },
    });
  });
});
