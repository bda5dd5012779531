import { ChainDashboard } from "./chain-dashboard";

export default function ChainPage() {
  return <ChainDashboard initialUnderlying={process.env.DEFAULT_UNDERLYING ?? "BTC"} />;
}
