import type { Config } from "tailwindcss";

export default {
  content: ["./index.html", "./src/**/*.{ts,tsx}"],
  darkMode: "media",
  theme: {
    extend: {
      colors: {
        dial: {
          "surface-light": "#f1f5f9",
          "surface-dark": "#080c14",
          "text-light": "#0f172a",
          "text-dark": "#f1f5f9",
        },
        gauge: {
          amber: "#f59e0b",
          red: "#ef4444",
          green: "#22c55e",
        },
      },
      animation: {
        "pulse-slow": "pulse 3s cubic-bezier(0.4, 0, 0.6, 1) infinite",
      },
    },
  },
  plugins: [],
} satisfies Config;
