/**
 * Unit tests for formatBytes
 */

import * as fc from "fast-check";
import { formatBytes, MB } from "./SizeFormatter";

describe("formatBytes", () => {
  it("should format zero bytes", () => {
    expect(formatBytes(0)).toBe("0.00 B");
  });

  it("should format one gibibyte as 1.00 GB", () => {
    expect(formatBytes(1073741824)).toBe("1.00 GB");
  });

  it("should stay in bytes below 1024", () => {
    expect(formatBytes(1023)).toBe("1023.00 B");
  });

  it("should switch units at 1024", () => {
    expect(formatBytes(1024)).toBe("1.00 KB");
    expect(formatBytes(1536)).toBe("1.50 KB");
    expect(formatBytes(150 * MB)).toBe("150.00 MB");
  });

  it("should cap the unit at TB", () => {
    expect(formatBytes(2048 * 1024 * 1024 * 1024 * 1024)).toBe("2048.00 TB");
  });

  it("should treat negative and non-finite input as zero", () => {
    expect(formatBytes(-5)).toBe("0.00 B");
    expect(formatBytes(Number.NaN)).toBe("0.00 B");
  });

  it("should always produce a two-decimal number and a known unit", () => {
    fc.assert(
      fc.property(fc.nat({ max: Number.MAX_SAFE_INTEGER }), (bytes) => {
        expect(formatBytes(bytes)).toMatch(/^\d+\.\d{2} (B|KB|MB|GB|TB)$/);
      })
    );
  });
});
