// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@components/kit/general/Wave`
 * Purpose: Click feedback ring that expands and fades from the edge of its child.
 * Scope: Wraps one element child, composing its onClick and appending the ring inside it. The child must be positioned.
 * Invariants: Each click mounts one ring that unmounts when its animation completes; disabled renders the child untouched.
 * Side-effects: none
 * Notes: Honors ConfigProvider `wave.disabled`.
 * @public
 */

"use client";

import { motion } from "motion/react";
import type { MouseEvent, ReactElement, ReactNode } from "react";
import { cloneElement, isValidElement, useCallback, useRef, useState } from "react";

import { waveRing } from "@/styles/ui";

import { useConfig } from "../theme";

interface WaveTargetProps {
  onClick?: ((event: MouseEvent<HTMLElement>) => void) | undefined;
  children?: ReactNode;
}

export interface WaveProps {
  children: ReactElement<WaveTargetProps>;
  disabled?: boolean;
}

export function Wave({ children, disabled = false }: WaveProps) {
  const { wave } = useConfig();
  const [rings, setRings] = useState<number[]>([]);
  const nextId = useRef(0);

  const handleClick = useCallback(
    (event: MouseEvent<HTMLElement>) => {
      children.props.onClick?.(event);
      nextId.current += 1;
      const id = nextId.current;
      setRings((current) => [...current, id]);
    },
    [children]
  );

  if (disabled || wave.disabled || !isValidElement(children)) {
    return children;
  }

  return cloneElement(children, {
    onClick: handleClick,
    children: (
      <>
        {children.props.children}
        {rings.map((id) => (
          <motion.span
            key={id}
            data-wave=""
            aria-hidden="true"
            className={waveRing()}
            initial={{ opacity: 0.35, scale: 1 }}
            animate={{ opacity: 0, scale: 1.12 }}
            transition={{ duration: 0.4, ease: "easeOut" }}
            onAnimationComplete={() =>
              setRings((current) => current.filter((ring) => ring !== id))
            }
          />
        ))}
      </>
    ),
  });
}

Wave.displayName = "Wave";
