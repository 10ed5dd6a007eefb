import { PortfolioDashboard } from "@/components/dashboard/portfolio-dashboard";

export default function HomePage(): React.JSX.Element {
  return <PortfolioDashboard />;
}
