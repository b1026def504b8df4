// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@examples/DataEntryExamples`
 * Purpose: Example screen for Checkbox, Radio, Switch, Input, InputNumber, Rate, Segmented, Select, AutoComplete, Slider, DatePicker, TimePicker and Upload.
 * Scope: Controlled demos keep their values in local state; Upload uses an in-memory request so the screen never touches the network.
 * Side-effects: time (simulated upload progress)
 * Links: src/examples/ComponentGallery.tsx
 * @public
 */

"use client";

import { Frown, Heart, Smile, UploadCloud } from "lucide-react";
import type { ReactElement } from "react";
import { useState } from "react";

import type {
  CheckboxValue,
  RadioValue,
  SegmentedValue,
  SelectValue,
  TimeValue,
  UploadRequest,
} from "@/components";
import {
  AutoComplete,
  Button,
  Checkbox,
  DatePicker,
  Flex,
  Input,
  InputNumber,
  Radio,
  Rate,
  Segmented,
  Select,
  Slider,
  Switch,
  TimePicker,
  Upload,
} from "@/components";

import { DemoBlock } from "./DemoBlock";

const fruitOptions = [
  { label: "Apple", value: "apple" },
  { label: "Pear", value: "pear" },
  { label: "Orange", value: "orange", disabled: true },
];

const cityOptions = [
  {
    label: "Europe",
    options: [
      { label: "Lisbon", value: "lisbon" },
      { label: "Oslo", value: "oslo" },
    ],
  },
  {
    label: "Asia",
    options: [
      { label: "Seoul", value: "seoul" },
      { label: "Hanoi", value: "hanoi" },
    ],
  },
];

const mailDomains = ["example.com", "example.org", "example.net"];

/** Reports progress in four ticks, then succeeds. */
const simulatedRequest: UploadRequest = ({ file, onProgress, onSuccess }) => {
  let percent = 0;
  const id = setInterval(() => {
    percent += 25;
    onProgress({ percent });
    if (percent >= 100) {
      clearInterval(id);
      onSuccess({ name: file.name });
    }
  }, 150);
  return { abort: () => clearInterval(id) };
};

export function DataEntryExamples(): ReactElement {
  const [fruits, setFruits] = useState<CheckboxValue[]>(["apple"]);
  const [size, setSize] = useState<RadioValue>("m");
  const [view, setView] = useState<SegmentedValue>("List");
  const [amount, setAmount] = useState<number | null>(1000);
  const [range, setRange] = useState<[number, number]>([20, 60]);
  const [time, setTime] = useState<TimeValue | null>(null);
  const [cities, setCities] = useState<SelectValue[]>(["lisbon"]);
  const [email, setEmail] = useState("");
  const [date, setDate] = useState<Date | null>(null);
  const [score, setScore] = useState(2.5);

  const allChecked = fruits.length === 2;

  return (
    <Flex vertical gap="large">
      <DemoBlock title="Checkbox">
        <Checkbox
          checked={allChecked}
          indeterminate={fruits.length > 0 && !allChecked}
          onChange={(event) => setFruits(event.target.checked ? ["apple", "pear"] : [])}
        >
          Check all
        </Checkbox>
        <Checkbox.Group options={fruitOptions} value={fruits} onChange={setFruits} />
      </DemoBlock>

      <DemoBlock title="Radio">
        <Radio.Group
          value={size}
          onChange={setSize}
          options={[
            { label: "Small", value: "s" },
            { label: "Medium", value: "m" },
            { label: "Large", value: "l" },
          ]}
        />
        <Radio.Group defaultValue="a" optionType="button" buttonStyle="solid">
          <Radio.Button value="a">Hangzhou</Radio.Button>
          <Radio.Button value="b">Shanghai</Radio.Button>
          <Radio.Button value="c" disabled>
            Beijing
          </Radio.Button>
        </Radio.Group>
      </DemoBlock>

      <DemoBlock title="Switch">
        <Switch defaultChecked />
        <Switch size="small" checkedChildren="On" unCheckedChildren="Off" />
        <Switch loading defaultChecked />
        <Switch disabled />
      </DemoBlock>

      <DemoBlock title="Input" vertical>
        <Input placeholder="Basic" allowClear />
        <Input addonBefore="https://" addonAfter=".com" defaultValue="antler" />
        <Input showCount maxLength={20} placeholder="Counted" />
        <Input status="error" placeholder="Error status" />
        <Input.Password placeholder="Password" />
        <Input.Search placeholder="Search" enterButton allowClear />
        <Input.TextArea autoSize={{ minRows: 2, maxRows: 5 }} showCount maxLength={200} />
        <Input.OTP length={6} />
      </DemoBlock>

      <DemoBlock title="InputNumber">
        <InputNumber
          value={amount}
          onChange={setAmount}
          min={0}
          step={100}
          formatter={(value) => value.replace(/\B(?=(\d{3})+(?!\d))/g, ",")}
          parser={(display) => display.replace(/,/g, "")}
          addonBefore="$"
        />
        <InputNumber min={0} max={1} step={0.1} precision={2} defaultValue={0.5} />
        <InputNumber disabled defaultValue={3} />
      </DemoBlock>

      <DemoBlock title="Rate">
        <Rate allowHalf value={score} onChange={setScore} />
        <Rate
          count={3}
          defaultValue={2}
          character={({ index }) =>
            index === 0 ? <Frown className="size-5" /> : <Smile className="size-5" />
          }
        />
        <Rate character={<Heart className="size-5" />} tooltips={["bad", "poor", "ok", "good", "great"]} />
        <Rate disabled defaultValue={4} />
      </DemoBlock>

      <DemoBlock title="Segmented">
        <Segmented options={["List", "Kanban", "Calendar"]} value={view} onChange={setView} />
        <Segmented
          size="small"
          options={[
            { label: "Daily", value: "d" },
            { label: "Weekly", value: "w", disabled: true },
          ]}
        />
      </DemoBlock>

      <DemoBlock title="Slider" vertical>
        <Slider defaultValue={30} tooltip={{ formatter: (value) => `${value}%` }} />
        <Slider range value={range} onChange={setRange} />
        <Slider marks={{ 0: "0°C", 26: "26°C", 100: "100°C" }} step={null} defaultValue={26} />
        <div className="h-40">
          <Slider vertical defaultValue={40} />
        </div>
      </DemoBlock>

      <DemoBlock title="Select" vertical>
        <Select className="w-60" options={fruitOptions} allowClear placeholder="Pick a fruit" />
        <Select
          className="w-80"
          mode="multiple"
          options={cityOptions}
          value={cities}
          onChange={setCities}
          maxTagCount={2}
        />
        <Select className="w-80" mode="tags" placeholder="Add labels" />
      </DemoBlock>

      <DemoBlock title="AutoComplete">
        <AutoComplete
          className="w-60"
          value={email}
          onChange={setEmail}
          placeholder="Email"
          options={
            email === "" || email.includes("@")
              ? []
              : mailDomains.map((domain) => ({ value: `${email}@${domain}` }))
          }
        />
      </DemoBlock>

      <DemoBlock title="DatePicker">
        <DatePicker value={date} onChange={setDate} />
        <DatePicker picker="week" />
        <DatePicker picker="month" />
        <DatePicker picker="quarter" />
        <DatePicker picker="year" />
        <DatePicker.RangePicker
          presets={[
            {
              label: "Next 7 days",
              value: () => {
                const start = new Date();
                return [start, new Date(start.getFullYear(), start.getMonth(), start.getDate() + 7)];
              },
            },
          ]}
        />
      </DemoBlock>

      <DemoBlock title="TimePicker">
        <TimePicker value={time} onChange={setTime} />
        <TimePicker format="HH:mm" minuteStep={15} needConfirm={false} />
        <TimePicker use12Hours format="h:mm a" />
      </DemoBlock>

      <DemoBlock title="Upload" vertical>
        <Upload customRequest={simulatedRequest} multiple maxCount={3}>
          <Button icon={<UploadCloud />}>Select files</Button>
        </Upload>
        <Upload type="drag" customRequest={simulatedRequest} listType="picture">
          <p className="py-6 text-center">Drop files here</p>
        </Upload>
      </DemoBlock>
    </Flex>
  );
}
