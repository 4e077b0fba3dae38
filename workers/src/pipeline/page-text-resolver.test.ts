/**
 * Validation Suite: PageTextResolver
 */

import { describe, it, expect, vi, beforeEach, type Mock } from "vitest";
import { PageTextResolver, alnumRatio } from "./page-text-resolver.js";
import { RunAbortedError } from "../errors.js";
import type { OcrEngine, PageImage, PageSource } from "../types.js";

const policy = { minNativeChars: 100, minAlnumRatio: 0.5, ocrTimeoutMs: 1000 };

function source(index: number, nativeText: string): PageSource & {
  renderImage: Mock<() => Promise<PageImage>>;
} {
  return {
    index,
    nativeText,
    renderImage: vi.fn(async (): Promise<PageImage> => ({
      pageIndex: index,
      mimeType: "application/pdf",
      data: new Uint8Array([index]),
    })),
  };
}

function ocrReturning(text: string) {
  const recognize = vi.fn<OcrEngine["recognize"]>(async () => text);
  return { engine: { recognize }, recognize };
}

describe("alnumRatio", () => {
  it("should ignore whitespace", () => {
    expect(alnumRatio("ab  12\n")).toBe(1);
    expect(alnumRatio("a-b-")).toBe(0.5);
    expect(alnumRatio("   ")).toBe(0);
    expect(alnumRatio("保單")).toBe(1);
  });
});

describe("PageTextResolver", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  it("should keep trusted native text without rendering or OCR", async () => {
    const { engine, recognize } = ocrReturning("ignored");
    const page = source(1, "Policy Number MP-2024-0001 ".repeat(20));

    const resolved = await new PageTextResolver(engine, policy).resolve(page);

    expect(resolved.method).toBe("native");
    expect(resolved.text).toBe(page.nativeText);
    expect(resolved.ocrText).toBeNull();
    expect(page.renderImage).not.toHaveBeenCalled();
    expect(recognize).not.toHaveBeenCalled();
    expect(Object.isFrozen(resolved)).toBe(true);
  });

  it("should OCR only the page below the threshold", async () => {
    const { engine, recognize } = ocrReturning(
      "Registration Mark: AB 1234 Make: Toyota",
    );
    const resolver = new PageTextResolver(engine, policy);
    const short = source(0, "Hello");
    const long = source(1, "x".repeat(500));

    const pages = await Promise.all([
      resolver.resolve(short),
      resolver.resolve(long),
    ]);

    expect(recognize).toHaveBeenCalledTimes(1);
    expect(recognize.mock.calls[0][0].pageIndex).toBe(0);
    expect(pages[0].method).toBe("ocr");
    expect(pages[0].text).toBe("Registration Mark: AB 1234 Make: Toyota");
    expect(pages[1].method).toBe("native");
    expect(long.renderImage).not.toHaveBeenCalled();
  });

  it("should distrust long text made of stray glyphs", async () => {
    const { engine, recognize } = ocrReturning("Real text from the scan");
    const resolver = new PageTextResolver(engine, policy);

    const page = await resolver.resolve(source(0, "., ·· ;; ".repeat(30)));

    expect(recognize).toHaveBeenCalledTimes(1);
    expect(page.method).toBe("ocr");
    expect(page.text).toBe("Real text from the scan");
  });

  it("should keep the native text when OCR returns nothing", async () => {
    const { engine } = ocrReturning("");
    const page = await new PageTextResolver(engine, policy).resolve(
      source(0, "Page 2"),
    );

    expect(page.method).toBe("native");
    expect(page.text).toBe("Page 2");
    expect(page.ocrText).toBe("");
  });

  it("should treat OCR errors as empty text and record the reason", async () => {
    const recognize = vi.fn<OcrEngine["recognize"]>(async () => {
      throw new Error("mistral-ocr API error (500): boom");
    });
    const page = await new PageTextResolver({ recognize }, policy).resolve(
      source(0, ""),
    );

    expect(page.text).toBe("");
    expect(page.ocrError).toBe("mistral-ocr API error (500): boom");
    expect(page.confidence).toBe(0);
  });

  it("should treat an OCR timeout as empty text", async () => {
    const recognize = vi.fn<OcrEngine["recognize"]>(
      () => new Promise<string>(() => {}),
    );
    const page = await new PageTextResolver(
      { recognize },
      { ...policy, ocrTimeoutMs: 10 },
    ).resolve(source(4, "ab"));

    expect(page.text).toBe("ab");
    expect(page.method).toBe("native");
    expect(page.ocrError).toBe("Page 5 OCR timed out after 10ms");
  });

  it("should propagate caller aborts", async () => {
    const controller = new AbortController();
    const recognize = vi.fn<OcrEngine["recognize"]>(() => {
      controller.abort();
      return new Promise<string>(() => {});
    });

    await expect(
      new PageTextResolver({ recognize }, policy).resolve(source(0, ""), {
        signal: controller.signal,
      }),
    ).rejects.toBeInstanceOf(RunAbortedError);
  });
});
