import type { Config } from "tailwindcss";

const config: Config = {
  content: ["./app/**/*.{ts,tsx}", "./src/**/*.{ts,tsx}"],
  theme: {
    extend: {
      colors: {
        ink: "#0b0d12",
        haze: "#f4f1ea",
        ember: "#f25f4c"
      }
    }
  },
  plugins: []
};

export default config;
