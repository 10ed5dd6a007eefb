import { AlertCircle, Building2, Loader2 } from "lucide-react";

interface StateProps {
  title: string;
  description: string;
}

function BaseState({ icon, title, description }: StateProps & { icon: React.JSX.Element }): React.JSX.Element {
  return (
    <div className="flex flex-col py-16 text-center">
      <div className="mx-auto">{icon}</div>
      <h3 className="mt-3 text-base font-semibold text-[var(--text-primary)]">{title}</h3>
      <p className="mx-auto mt-1 max-w-xl text-sm text-[var(--text-secondary)]">{description}</p>
    </div>
  );
}

export function EmptyState({
  title = "No companies match",
  description = "Loosen the filters or reset them to see the whole portfolio.",
}: Partial<StateProps>): React.JSX.Element {
  return (
    <BaseState
      icon={<Building2 className="h-5 w-5 text-[var(--text-secondary)]" aria-hidden="true" />}
      title={title}
      description={description}
    />
  );
}

export function LoadingState({
  title = "Loading portfolio",
  description = "Fetching companies and firm statistics...",
}: Partial<StateProps>): React.JSX.Element {
  return (
    <BaseState
      icon={<Loader2 className="h-5 w-5 animate-spin text-accent" aria-hidden="true" />}
      title={title}
      description={description}
    />
  );
}

export function ErrorState({
  title = "Could not load the portfolio",
  description = "Check that the API is reachable and try again.",
}: Partial<StateProps>): React.JSX.Element {
  return (
    <BaseState
      icon={<AlertCircle className="h-5 w-5 text-red-400" aria-hidden="true" />}
      title={title}
      description={description}
    />
  );
}
