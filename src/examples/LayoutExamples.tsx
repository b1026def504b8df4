// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/LayoutExamples`
 * Purpose: Example screen for Divider, Flex, Space, Row/Col and Layout.
 * Side-effects: none
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import type { ReactElement, ReactNode } from "react";

import {
  Button,
  Col,
  Divider,
  Flex,
  Input,
  Layout,
  Row,
  Space,
} from "@/components";

import { DemoBlock } from "./DemoBlock";

function Cell({ children }: { children: ReactNode }): ReactElement {
  return (
    <div className="rounded bg-primary-bg px-3 py-2 text-center text-fg">
      {children}
    </div>
  );
}

export function LayoutExamples(): ReactElement {
  return (
    <Flex vertical gap="large">
      <DemoBlock title="Divider" vertical>
        <p>Above the line</p>
        <Divider>Centered</Divider>
        <Divider orientation="left" plain>
          Left plain
        </Divider>
        <Divider dashed />
        <span>
          Inline <Divider type="vertical" /> separated <Divider type="vertical" /> text
        </span>
      </DemoBlock>

      <DemoBlock title="Flex" vertical>
        <Flex justify="space-between" align="center" gap="small">
          <Button>One</Button>
          <Button>Two</Button>
          <Button>Three</Button>
        </Flex>
        <Flex vertical gap={4}>
          <Cell>Stacked A</Cell>
          <Cell>Stacked B</Cell>
        </Flex>
      </DemoBlock>

      <DemoBlock title="Space" vertical>
        <Space split={<Divider type="vertical" />}>
          <a href="#layout">Edit</a>
          <a href="#layout">Share</a>
          <a href="#layout">Delete</a>
        </Space>
        <Space size={[8, 16]} wrap>
          {Array.from({ length: 8 }, (_, i) => (
            <Button key={i}>Item {i + 1}</Button>
          ))}
        </Space>
        <Space.Compact block>
          <Input defaultValue="https://example.test" />
          <Button type="primary">Go</Button>
        </Space.Compact>
      </DemoBlock>

      <DemoBlock title="Grid" vertical>
        <Row gutter={[16, 8]}>
          <Col span={12}>
            <Cell>span 12</Cell>
          </Col>
          <Col span={12}>
            <Cell>span 12</Cell>
          </Col>
          <Col span={8}>
            <Cell>span 8</Cell>
          </Col>
          <Col span={8} offset={8}>
            <Cell>span 8, offset 8</Cell>
          </Col>
        </Row>
        <Row justify="space-between" align="middle">
          <Col span={4}>
            <Cell>4</Cell>
          </Col>
          <Col span={4}>
            <Cell>4</Cell>
          </Col>
        </Row>
      </DemoBlock>

      <DemoBlock title="Layout">
        <Layout hasSider className="w-full">
          <Layout.Sider collapsible width={160} collapsedWidth={64}>
            <div className="p-4">Sider</div>
          </Layout.Sider>
          <Layout>
            <Layout.Header>Header</Layout.Header>
            <Layout.Content className="p-4">Content</Layout.Content>
            <Layout.Footer>Footer</Layout.Footer>
          </Layout>
        </Layout>
      </DemoBlock>
    </Flex>
  );
}
