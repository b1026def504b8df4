// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/components/kit/data-display/watermark-utils`
 * Purpose: Verifies the Watermark tile size, text layout, escaping and image content.
 * Side-effects: none
 * Links: src/components/kit/data-display/watermark-utils.ts
 * @public
 */

import { describe, expect, it } from "vitest";

import {
  buildWatermarkTile,
  escapeXml,
  renderWatermarkContent,
} from "@/components/kit/data-display/watermark-utils";

const PREFIX = "data:image/svg+xml;charset=utf-8,";

function decode(url: string): string {
  return decodeURIComponent(url.slice(PREFIX.length));
}

describe("escapeXml", () => {
  it("escapes markup characters", () => {
    expect(escapeXml(`<a href="x">Tom & Jerry's</a>`)).toBe(
      "&lt;a href=&quot;x&quot;&gt;Tom &amp; Jerry&apos;s&lt;/a&gt;"
    );
  });
});

describe("renderWatermarkContent", () => {
  it("stacks lines fontSize + 8 apart around the origin", () => {
    const markup = renderWatermarkContent(["Draft", "Internal"], {
      width: 120,
      height: 64,
      font: { fontSize: 16 },
    });

    expect(markup).toContain('<tspan x="0" y="-12">Draft</tspan><tspan x="0" y="12">Internal</tspan>');
  });

  it("maps named font weights and alignment", () => {
    const markup = renderWatermarkContent(["Draft"], {
      width: 120,
      height: 64,
      font: { fontWeight: "light", textAlign: "start" },
    });

    expect(markup).toContain('font-weight="300"');
    expect(markup).toContain('text-anchor="start"');
    expect(markup).toContain('<tspan x="-60" y="0">Draft</tspan>');
  });

  it("places an image over the content box", () => {
    expect(
      renderWatermarkContent([], { width: 120, height: 64, image: "logo.png", font: {} })
    ).toBe(
      '<image href="logo.png" x="-60" y="-32" width="120" height="64" preserveAspectRatio="xMidYMid meet"/>'
    );
  });
});

describe("buildWatermarkTile", () => {
  it("sizes the tile as content plus gap and rotates around the content centre", () => {
    const tile = buildWatermarkTile({ content: "A&B" });

    expect(tile?.width).toBe(220);
    expect(tile?.height).toBe(164);
    expect(tile?.url.startsWith(PREFIX)).toBe(true);
    const svg = decode(tile?.url ?? PREFIX);
    expect(svg).toContain('width="220" height="164"');
    expect(svg).toContain('<g transform="translate(60 32) rotate(-22)">');
    expect(svg).toContain('<tspan x="0" y="0">A&amp;B</tspan>');
    expect(svg).toContain('fill="rgba(0,0,0,0.15)"');
  });

  it("uses the given gap and rotation", () => {
    const tile = buildWatermarkTile({
      content: ["One"],
      width: 100,
      height: 40,
      gap: [20, 10],
      rotate: 0,
    });

    expect(tile?.width).toBe(120);
    expect(tile?.height).toBe(50);
    expect(decode(tile?.url ?? PREFIX)).toContain("translate(50 20) rotate(0)");
  });

  it("returns null without content or image", () => {
    expect(buildWatermarkTile({})).toBeNull();
    expect(buildWatermarkTile({ content: [] })).toBeNull();
  });
});
