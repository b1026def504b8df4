// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/DemoBlock`
 * Purpose: Titled frame for one component demo inside an example screen.
 * Side-effects: none
 * @internal
 */

import type { ReactElement, ReactNode } from "react";

import { Card, Flex } from "@/components";

export interface DemoBlockProps {
  title: string;
  vertical?: boolean;
  children: ReactNode;
}

export function DemoBlock({
  title,
  vertical = false,
  children,
}: DemoBlockProps): ReactElement {
  return (
    <Card size="small" title={title}>
      <Flex vertical={vertical} wrap gap="middle" align={vertical ? undefined : "center"}>
        {children}
      </Flex>
    </Card>
  );
}
