import { cn } from "@/lib/utils";

interface StatCardProps {
  title: string;
  value: string;
  icon: React.JSX.Element;
  subtitle?: string;
  className?: string;
}

export function StatCard({ title, value, icon, subtitle, className }: StatCardProps): React.JSX.Element {
  return (
    <div className={cn("rounded-xl border border-border/60 bg-card p-5", className)}>
      <div className="flex items-start justify-between gap-3">
        <p className="section-header">{title}</p>
        <span className="text-accent">{icon}</span>
      </div>
      <p className="mt-3 text-3xl font-semibold tabular-nums text-[var(--text-primary)]">{value}</p>
      {subtitle ? <p className="mt-1 text-sm text-[var(--text-secondary)]">{subtitle}</p> : null}
    </div>
  );
}
