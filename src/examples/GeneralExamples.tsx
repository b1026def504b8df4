// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/GeneralExamples`
 * Purpose: Example screen for Button, FloatButton and Typography.
 * Scope: Local demo state only.
 * Side-effects: none
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import { Download, MessageCircle, Search, Settings } from "lucide-react";
import type { ReactElement } from "react";
import { useState } from "react";

import { Button, Flex, FloatButton, Typography } from "@/components";

import { DemoBlock } from "./DemoBlock";

const { Title, Text, Paragraph, Link } = Typography;

export function GeneralExamples(): ReactElement {
  const [loading, setLoading] = useState(false);

  return (
    <Flex vertical gap="large">
      <DemoBlock title="Button types">
        <Button type="primary">Primary</Button>
        <Button>Default</Button>
        <Button type="dashed">Dashed</Button>
        <Button type="text">Text</Button>
        <Button type="link">Link</Button>
        <Button danger>Danger</Button>
        <Button color="purple" variant="filled">
          Filled purple
        </Button>
      </DemoBlock>

      <DemoBlock title="Icons, shapes and sizes">
        <Button type="primary" shape="circle" icon={<Search />} aria-label="Search" />
        <Button shape="round" icon={<Download />} size="large">
          Download
        </Button>
        <Button icon={<Settings />} iconPosition="end" size="small">
          Settings
        </Button>
        <Button type="primary" ghost>
          Ghost
        </Button>
        <Button href="#general" target="_self">
          As link
        </Button>
        <Button disabled>Disabled</Button>
      </DemoBlock>

      <DemoBlock title="Loading">
        <Button
          type="primary"
          loading={loading ? { delay: 200 } : false}
          onClick={() => setLoading(true)}
        >
          Click to load
        </Button>
        <Button onClick={() => setLoading(false)}>Reset</Button>
        <Button type="primary">确定</Button>
      </DemoBlock>

      <DemoBlock title="Float buttons">
        <FloatButton
          icon={<MessageCircle />}
          tooltip="Support"
          badge={{ count: 5 }}
          style={{ insetInlineEnd: 96 }}
        />
        <FloatButton.Group trigger="click" type="primary" icon={<Settings />}>
          <FloatButton icon={<Search />} />
          <FloatButton description="Help" shape="square" />
        </FloatButton.Group>
        <FloatButton.BackTop visibilityHeight={200} />
      </DemoBlock>

      <DemoBlock title="Typography" vertical>
        <Title level={2}>Introduction</Title>
        <Paragraph>
          Widgets share one token set through <Text code>ConfigProvider</Text>.
        </Paragraph>
        <Flex gap="small" wrap>
          <Text type="secondary">Secondary</Text>
          <Text type="success">Success</Text>
          <Text type="warning">Warning</Text>
          <Text type="danger">Danger</Text>
          <Text disabled>Disabled</Text>
          <Text mark>Marked</Text>
          <Text keyboard>Ctrl</Text>
          <Text underline>Underline</Text>
          <Text delete>Deleted</Text>
          <Text strong>Strong</Text>
          <Text italic>Italic</Text>
          <Link href="#general">Link</Link>
        </Flex>
        <Paragraph copyable>Copy this sentence.</Paragraph>
        <Paragraph ellipsis={{ rows: 2 }}>
          Long passages clamp to the configured number of rows and end in an
          ellipsis once the text overflows the available width of its
          container, which keeps dense cards aligned.
        </Paragraph>
      </DemoBlock>
    </Flex>
  );
}
