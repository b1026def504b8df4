import type { Config } from "tailwindcss";

import {
  borderRadius,
  colors,
  fontSize,
  height,
} from "./src/styles/tailwind.preset";

export default {
  content: ["./src/**/*.{js,ts,jsx,tsx,mdx}"],
  theme: {
    extend: {
      colors: {
        transparent: "transparent",
        current: "currentColor",
        ...colors,
      },
      borderRadius,
      fontSize,
      height,
      minHeight: height,
      width: height,
      minWidth: height,
      fontFamily: {
        sans: "var(--ant-font-family)",
        mono: "var(--ant-font-family-code)",
      },
      keyframes: {
        "ant-skeleton": {
          "0%": { backgroundPosition: "100% 50%" },
          "100%": { backgroundPosition: "0 50%" },
        },
        "ant-processing": {
          "0%": { transform: "scale(0.8)", opacity: "0.5" },
          "100%": { transform: "scale(2.4)", opacity: "0" },
        },
        "ant-notice-progress": {
          "0%": { transform: "scaleX(1)" },
          "100%": { transform: "scaleX(0)" },
        },
      },
      animation: {
        "ant-skeleton": "ant-skeleton 1.4s ease infinite",
        "ant-processing": "ant-processing 1.2s ease-in-out infinite",
        "ant-notice-progress": "ant-notice-progress linear forwards",
      },
    },
  },
  plugins: [],
} satisfies Config;
