// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/FeedbackExamples`
 * Purpose: Example screen for Alert, Message, Notification, Modal, Drawer, Popconfirm, Progress, Result, Skeleton, Spin and Tour.
 * Scope: Uses the hook APIs (useMessage, useNotification, Modal.useModal) so notices inherit the gallery's ConfigProvider.
 * Side-effects: time (simulated async confirm)
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import type { ReactElement } from "react";
import { useRef, useState } from "react";

import {
  Alert,
  Button,
  Drawer,
  Flex,
  Modal,
  Popconfirm,
  Progress,
  Result,
  Skeleton,
  Spin,
  Switch,
  Tour,
  useMessage,
  useNotification,
} from "@/components";

import { DemoBlock } from "./DemoBlock";

const wait = (ms: number) =>
  new Promise<void>((resolve) => {
    setTimeout(resolve, ms);
  });

export function FeedbackExamples(): ReactElement {
  const [messageApi, messageHolder] = useMessage();
  const [notificationApi, notificationHolder] = useNotification();
  const [modalApi, modalHolder] = Modal.useModal();
  const [modalOpen, setModalOpen] = useState(false);
  const [drawerOpen, setDrawerOpen] = useState(false);
  const [loading, setLoading] = useState(true);
  const [tourOpen, setTourOpen] = useState(false);
  const tourTarget = useRef<HTMLDivElement>(null);

  return (
    <Flex vertical gap="large">
      {messageHolder}
      {notificationHolder}
      {modalHolder}

      <DemoBlock title="Alert" vertical>
        <Alert type="success" message="Saved" showIcon />
        <Alert
          type="warning"
          message="Quota almost used"
          description="Upgrade the plan to keep uploading."
          showIcon
          closable
          action={<Button size="small">Upgrade</Button>}
        />
        <Alert banner message="Scheduled maintenance tonight" />
      </DemoBlock>

      <DemoBlock title="Message and notification">
        <Button onClick={() => messageApi.success("Profile updated")}>Message</Button>
        <Button
          onClick={() => {
            const handle = messageApi.loading("Syncing", 0);
            void wait(1500).then(handle.close);
          }}
        >
          Loading message
        </Button>
        <Button
          onClick={() =>
            notificationApi.info({
              title: "New comment",
              description: "Someone replied to the thread.",
              placement: "bottomRight",
              showProgress: true,
            })
          }
        >
          Notification
        </Button>
      </DemoBlock>

      <DemoBlock title="Modal and drawer">
        <Button type="primary" onClick={() => setModalOpen(true)}>
          Open modal
        </Button>
        <Modal
          open={modalOpen}
          title="Basic modal"
          onOk={() => setModalOpen(false)}
          onCancel={() => setModalOpen(false)}
        >
          Modal content
        </Modal>
        <Button
          onClick={() =>
            modalApi.confirm({
              title: "Delete this item?",
              content: "OK waits one second before closing.",
              onOk: () => wait(1000),
            })
          }
        >
          Confirm
        </Button>
        <Button onClick={() => modalApi.error({ title: "Upload failed", content: "Try again later." })}>
          Error dialog
        </Button>
        <Button onClick={() => setDrawerOpen(true)}>Open drawer</Button>
        <Drawer
          open={drawerOpen}
          title="Settings"
          onClose={() => setDrawerOpen(false)}
          extra={<Button size="small">Apply</Button>}
          footer="Footer"
        >
          Drawer content
        </Drawer>
      </DemoBlock>

      <DemoBlock title="Popconfirm">
        <Popconfirm
          title="Delete the task"
          description="Are you sure?"
          onConfirm={() => wait(800)}
        >
          <Button danger>Delete</Button>
        </Popconfirm>
      </DemoBlock>

      <DemoBlock title="Progress">
        <div className="w-64">
          <Progress percent={30} />
          <Progress percent={70} status="exception" />
          <Progress percent={100} />
          <Progress percent={60} steps={5} />
          <Progress percent={50} strokeColor={{ from: "#108ee9", to: "#87d068" }} />
        </div>
        <Progress type="circle" percent={75} />
        <Progress type="dashboard" percent={40} success={{ percent: 20 }} />
      </DemoBlock>

      <DemoBlock title="Result">
        <Result
          status="success"
          title="Purchase complete"
          subTitle="Order 2024-001 is on its way."
          extra={<Button type="primary">Done</Button>}
        />
        <Result status="404" title="404" subTitle="This page does not exist." />
      </DemoBlock>

      <DemoBlock title="Skeleton and spin" vertical>
        <Switch checked={loading} onChange={setLoading} />
        <Skeleton loading={loading} active avatar paragraph={{ rows: 3 }}>
          <p>Loaded content</p>
        </Skeleton>
        <Flex gap="small">
          <Skeleton.Button active />
          <Skeleton.Input active />
          <Skeleton.Avatar active shape="square" />
          <Skeleton.Image />
        </Flex>
        <Spin spinning={loading} tip="Loading" delay={300}>
          <Alert type="info" message="Wrapped by Spin" />
        </Spin>
        <Spin size="small" />
      </DemoBlock>

      <DemoBlock title="Tour">
        <div ref={tourTarget} className="inline-block">
          <Button onClick={() => setTourOpen(true)}>Begin tour</Button>
        </div>
        <Tour
          open={tourOpen}
          onClose={() => setTourOpen(false)}
          steps={[
            {
              title: "Start here",
              description: "This button opens the tour.",
              target: () => tourTarget.current,
            },
            { title: "Centered step", description: "Steps without a target sit in the middle." },
          ]}
        />
      </DemoBlock>
    </Flex>
  );
}
