// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/ComponentGallery`
 * Purpose: Gallery with one example screen per component category, under a toolbar that switches theme, size and direction.
 * Scope: Wraps every screen in a ConfigProvider driven by the toolbar state. Screens mount on first visit and stay mounted.
 * Invariants: Only the active category's screen is visible.
 * Side-effects: none
 * Links: src/examples/*Examples.tsx, src/components/kit/theme/ConfigProvider.tsx
 * @public
 */

"use client";

import type { ReactElement } from "react";
import { useState } from "react";

import type { Direction, SegmentedValue, TabItem } from "@/components";
import {
  ConfigProvider,
  Flex,
  Layout,
  Segmented,
  Switch,
  Tabs,
  Typography,
} from "@/components";
import type { ThemeConfig } from "@/shared/theme";
import { darkAlgorithm, defaultAlgorithm } from "@/shared/theme";
import type { SizeType } from "@/styles/theme";

import { DataDisplayExamples } from "./DataDisplayExamples";
import { DataEntryExamples } from "./DataEntryExamples";
import { FeedbackExamples } from "./FeedbackExamples";
import { GeneralExamples } from "./GeneralExamples";
import { LayoutExamples } from "./LayoutExamples";
import { NavigationExamples } from "./NavigationExamples";

export const galleryCategories: TabItem[] = [
  { key: "general", label: "General", children: <GeneralExamples /> },
  { key: "layout", label: "Layout", children: <LayoutExamples /> },
  { key: "navigation", label: "Navigation", children: <NavigationExamples /> },
  { key: "data-entry", label: "Data entry", children: <DataEntryExamples /> },
  { key: "data-display", label: "Data display", children: <DataDisplayExamples /> },
  { key: "feedback", label: "Feedback", children: <FeedbackExamples /> },
];

const sizes: SizeType[] = ["small", "middle", "large"];

function isSize(value: SegmentedValue): value is SizeType {
  return sizes.some((size) => size === value);
}

export interface ComponentGalleryProps {
  defaultCategory?: string;
}

export function ComponentGallery({
  defaultCategory = "general",
}: ComponentGalleryProps): ReactElement {
  const [dark, setDark] = useState(false);
  const [size, setSize] = useState<SizeType>("middle");
  const [direction, setDirection] = useState<Direction>("ltr");

  const theme: ThemeConfig = {
    algorithm: dark ? darkAlgorithm : defaultAlgorithm,
  };

  return (
    <ConfigProvider theme={theme} componentSize={size} direction={direction}>
      <Layout className="min-h-screen">
        <Layout.Header>
          <Flex justify="space-between" align="center" className="h-full">
            <Typography.Title level={4} className="!mb-0">
              antler-ui
            </Typography.Title>
            <Flex gap="middle" align="center">
              <Segmented
                options={sizes}
                value={size}
                onChange={(value) => {
                  if (isSize(value)) setSize(value);
                }}
              />
              <Switch
                aria-label="Right to left"
                checked={direction === "rtl"}
                onChange={(checked) => setDirection(checked ? "rtl" : "ltr")}
              />
              <Switch
                aria-label="Dark theme"
                checked={dark}
                onChange={setDark}
              />
            </Flex>
          </Flex>
        </Layout.Header>
        <Layout.Content className="p-6">
          <Tabs defaultActiveKey={defaultCategory} items={galleryCategories} />
        </Layout.Content>
      </Layout>
    </ConfigProvider>
  );
}
