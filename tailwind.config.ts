import type { Config } from "tailwindcss";

export default {
  content: [
    "./src/Form.tsx",
    "./content/posts/react-hook-form.mdx",
    "./src/components/**/*.{js,ts,jsx,tsx,md,mdx}",
    "./src/styles/**/*.ts",
  ],
  theme: {
    extend: {},
  },
  plugins: [],
} satisfies Config;
