import { Badge, type BadgeProps } from "@/components/ui/badge";

interface TagPillProps {
  label: string;
  variant?: BadgeProps["variant"];
}

export function TagPill({ label, variant }: TagPillProps): React.JSX.Element {
  return (
    <Badge variant={variant} className="rounded-full px-3 py-1">
      {label}
    </Badge>
  );
}
