// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/DataDisplayExamples`
 * Purpose: Example screen for Avatar, Badge, Calendar, Card, Collapse, Empty, QRCode, Statistic, Tag, Timeline, Tooltip, Popover and Watermark.
 * Side-effects: time (countdown demo)
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import { Clock, Edit, MoreHorizontal, User } from "lucide-react";
import type { ReactElement } from "react";
import { useState } from "react";

import {
  Avatar,
  Badge,
  Button,
  Calendar,
  Card,
  Collapse,
  Empty,
  Flex,
  Popover,
  QRCode,
  Statistic,
  Tag,
  Timeline,
  Tooltip,
  Watermark,
} from "@/components";

import { DemoBlock } from "./DemoBlock";

const HOUR_MS = 60 * 60 * 1000;

const tagTopics = ["Movies", "Books", "Music", "Sports"];

export function DataDisplayExamples(): ReactElement {
  const [deadline] = useState(() => Date.now() + 2 * HOUR_MS);
  const [topics, setTopics] = useState<string[]>(["Books"]);
  const [tags, setTags] = useState(["alpha", "beta", "gamma"]);
  const [qrExpired, setQrExpired] = useState(true);

  return (
    <Flex vertical gap="large">
      <DemoBlock title="Avatar">
        <Avatar icon={<User className="size-4" />} />
        <Avatar shape="square" size="large">
          AU
        </Avatar>
        <Avatar size={48} src="/avatar-placeholder.png" alt="Placeholder avatar" />
        <Avatar.Group max={{ count: 2 }}>
          <Avatar>A</Avatar>
          <Avatar>B</Avatar>
          <Avatar>C</Avatar>
          <Avatar>D</Avatar>
        </Avatar.Group>
      </DemoBlock>

      <DemoBlock title="Badge">
        <Badge count={5}>
          <Avatar shape="square">M</Avatar>
        </Badge>
        <Badge count={120} overflowCount={99}>
          <Avatar shape="square">N</Avatar>
        </Badge>
        <Badge dot>
          <Avatar shape="square">D</Avatar>
        </Badge>
        <Badge status="processing" text="Running" />
        <Badge status="error" text="Failed" />
        <Badge.Ribbon text="Hot" color="red">
          <Card size="small">Ribbon card</Card>
        </Badge.Ribbon>
      </DemoBlock>

      <DemoBlock title="Calendar">
        <div className="w-80">
          <Calendar fullscreen={false} />
        </div>
      </DemoBlock>

      <DemoBlock title="Card">
        <Card
          title="Project"
          extra={<a href="#data-display">More</a>}
          actions={[
            <Edit key="edit" className="size-4" aria-label="Edit" />,
            <MoreHorizontal key="more" className="size-4" aria-label="More" />,
          ]}
          className="w-72"
        >
          <Card.Meta
            avatar={<Avatar>P</Avatar>}
            title="antler-ui"
            description="Widget catalog"
          />
        </Card>
        <Card loading className="w-72" title="Loading" />
        <Card
          className="w-72"
          tabList={[
            { key: "one", label: "One" },
            { key: "two", label: "Two" },
          ]}
        >
          Tabbed card
        </Card>
      </DemoBlock>

      <DemoBlock title="Collapse" vertical>
        <Collapse
          defaultActiveKey={["1"]}
          items={[
            { key: "1", label: "First panel", children: "First body" },
            { key: "2", label: "Second panel", children: "Second body", extra: <Clock className="size-4" /> },
            { key: "3", label: "Disabled panel", children: "Hidden", collapsible: "disabled" },
          ]}
        />
        <Collapse
          accordion
          ghost
          items={[
            { key: "a", label: "Accordion A", children: "Body A" },
            { key: "b", label: "Accordion B", children: "Body B" },
          ]}
        />
      </DemoBlock>

      <DemoBlock title="Empty">
        <Empty />
        <Empty image={Empty.PRESENTED_IMAGE_SIMPLE} description="No results">
          <Button type="primary">Create</Button>
        </Empty>
      </DemoBlock>

      <DemoBlock title="QRCode">
        <QRCode value="https://example.com" />
        <QRCode type="svg" value="https://example.com" color="#1677ff" size={120} />
        <QRCode
          value="https://example.com/login"
          status={qrExpired ? "expired" : "active"}
          onRefresh={() => setQrExpired(false)}
        />
      </DemoBlock>

      <DemoBlock title="Statistic">
        <Statistic title="Active users" value={112893} />
        <Statistic title="Balance" value={9876.5} precision={2} prefix="$" />
        <Statistic.Countdown title="Countdown" value={deadline} format="HH:mm:ss" />
      </DemoBlock>

      <DemoBlock title="Tag">
        <Tag>Plain</Tag>
        <Tag color="magenta">magenta</Tag>
        <Tag color="success">success</Tag>
        <Tag color="#87d068">#87d068</Tag>
        <Tag bordered={false}>borderless</Tag>
        {tags.map((tag) => (
          <Tag key={tag} closable onClose={() => setTags(tags.filter((t) => t !== tag))}>
            {tag}
          </Tag>
        ))}
        {tagTopics.map((topic) => (
          <Tag.CheckableTag
            key={topic}
            checked={topics.includes(topic)}
            onChange={(checked) =>
              setTopics(checked ? [...topics, topic] : topics.filter((t) => t !== topic))
            }
          >
            {topic}
          </Tag.CheckableTag>
        ))}
      </DemoBlock>

      <DemoBlock title="Timeline">
        <Timeline
          items={[
            { children: "Create a services site" },
            { color: "green", children: "Solve initial network problems" },
            { color: "red", children: "Technical testing" },
          ]}
          pending="Recording..."
        />
        <Timeline
          mode="alternate"
          items={[
            { label: "2024-01-01", children: "Kickoff" },
            { label: "2024-02-01", children: "Beta" },
            { label: "2024-03-01", children: "Launch" },
          ]}
        />
      </DemoBlock>

      <DemoBlock title="Tooltip and Popover">
        <Tooltip title="Prompt text">
          <Button>Hover me</Button>
        </Tooltip>
        <Tooltip title="Bottom, colored" placement="bottom" color="blue">
          <Button>Colored</Button>
        </Tooltip>
        <Popover title="Title" content="Popover body" trigger="click">
          <Button type="primary">Click me</Button>
        </Popover>
      </DemoBlock>

      <DemoBlock title="Watermark" vertical>
        <Watermark content={["Internal", "Do not share"]}>
          <div className="h-48 rounded-lg bg-fill-quaternary p-4">
            Quarterly numbers are shown to the team only.
          </div>
        </Watermark>
      </DemoBlock>
    </Flex>
  );
}
