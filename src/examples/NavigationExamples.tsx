// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/NavigationExamples`
 * Purpose: Example screen for Breadcrumb, Dropdown, Menu, Pagination, Steps and Tabs.
 * Scope: Keeps the demo's current step, page and editable tab list in local state.
 * Side-effects: none
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import { Home, Mail, Settings, User } from "lucide-react";
import type { MouseEvent, ReactElement } from "react";
import { useState } from "react";

import type { MenuItem, TabItem } from "@/components";
import {
  Breadcrumb,
  Button,
  Dropdown,
  Flex,
  Menu,
  Pagination,
  Steps,
  Tabs,
} from "@/components";

import { DemoBlock } from "./DemoBlock";

const menuItems: MenuItem[] = [
  { key: "mail", label: "Mail", icon: <Mail className="size-4" /> },
  {
    key: "account",
    label: "Account",
    icon: <User className="size-4" />,
    children: [
      { key: "profile", label: "Profile" },
      { key: "security", label: "Security" },
      { type: "divider" },
      { key: "logout", label: "Log out", danger: true },
    ],
  },
  {
    type: "group",
    key: "system",
    label: "System",
    children: [
      { key: "settings", label: "Settings", icon: <Settings className="size-4" /> },
      { key: "legacy", label: "Legacy", disabled: true },
    ],
  },
];

const dropdownItems: MenuItem[] = [
  { key: "rename", label: "Rename" },
  { key: "duplicate", label: "Duplicate" },
  { key: "delete", label: "Delete", danger: true },
];

const initialTabs: TabItem[] = [
  { key: "1", label: "Overview", children: "Overview pane" },
  { key: "2", label: "Activity", children: "Activity pane" },
  { key: "3", label: "Locked", children: "Never shown", disabled: true },
];

export function NavigationExamples(): ReactElement {
  const [step, setStep] = useState(1);
  const [page, setPage] = useState(1);
  const [tabs, setTabs] = useState<TabItem[]>([
    { key: "a", label: "Tab A", children: "Content A" },
    { key: "b", label: "Tab B", children: "Content B" },
  ]);
  const [activeTab, setActiveTab] = useState("a");
  const [nextTab, setNextTab] = useState(3);
  const [lastAction, setLastAction] = useState("none");

  const editTabs = (target: string | MouseEvent, action: "add" | "remove") => {
    if (action === "add") {
      const key = `tab-${nextTab}`;
      setNextTab(nextTab + 1);
      setTabs([...tabs, { key, label: `Tab ${nextTab}`, children: `Content ${nextTab}` }]);
      setActiveTab(key);
      return;
    }
    const next = tabs.filter((tab) => tab.key !== target);
    setTabs(next);
    if (activeTab === target && next[0]) setActiveTab(next[0].key);
  };

  return (
    <Flex vertical gap="large">
      <DemoBlock title="Breadcrumb">
        <Breadcrumb
          items={[
            { title: <Home className="size-4" aria-label="Home" />, href: "#navigation" },
            { title: "Library", menu: { items: dropdownItems } },
            { title: "Components" },
          ]}
        />
      </DemoBlock>

      <DemoBlock title="Dropdown">
        <Dropdown
          menu={{ items: dropdownItems, onClick: ({ key }) => setLastAction(key) }}
          trigger={["click"]}
        >
          <Button>Actions</Button>
        </Dropdown>
        <Dropdown.Button
          menu={{ items: dropdownItems, onClick: ({ key }) => setLastAction(key) }}
          onClick={() => setLastAction("save")}
        >
          Save
        </Dropdown.Button>
        <span>Last action: {lastAction}</span>
      </DemoBlock>

      <DemoBlock title="Menu" vertical>
        <Menu mode="horizontal" items={menuItems} defaultSelectedKeys={["mail"]} />
        <div className="w-64">
          <Menu
            mode="inline"
            items={menuItems}
            defaultOpenKeys={["account"]}
            defaultSelectedKeys={["profile"]}
          />
        </div>
      </DemoBlock>

      <DemoBlock title="Pagination" vertical>
        <Pagination
          current={page}
          total={500}
          onChange={(next) => setPage(next)}
          showSizeChanger
          showQuickJumper
          showTotal={(total, [from, to]) => `${from}-${to} of ${total} items`}
        />
        <Pagination simple defaultCurrent={2} total={50} />
        <Pagination size="small" total={50} disabled />
      </DemoBlock>

      <DemoBlock title="Steps" vertical>
        <Steps
          current={step}
          onChange={setStep}
          items={[
            { title: "Account", description: "Create a login" },
            { title: "Profile", subTitle: "2 minutes" },
            { title: "Done" },
          ]}
        />
        <Steps
          direction="vertical"
          size="small"
          current={1}
          status="error"
          items={[{ title: "Upload" }, { title: "Verify" }, { title: "Publish" }]}
        />
        <Steps progressDot current={1} items={[{ title: "Draft" }, { title: "Review" }, { title: "Live" }]} />
      </DemoBlock>

      <DemoBlock title="Tabs" vertical>
        <Tabs items={initialTabs} tabBarExtraContent={<Button size="small">Extra</Button>} />
        <Tabs type="card" tabPosition="left" items={initialTabs} />
        <Tabs
          type="editable-card"
          activeKey={activeTab}
          onChange={setActiveTab}
          onEdit={editTabs}
          items={tabs}
        />
      </DemoBlock>
    </Flex>
  );
}
