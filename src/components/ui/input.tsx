import * as React from "react";

import { cn } from "@/lib/utils";

const fieldClassName =
  "flex h-10 w-full rounded-md border border-border bg-card px-3 py-2 text-sm text-[var(--text-primary)] placeholder:text-[var(--text-tertiary)] transition-colors duration-150 focus-visible:outline-none focus-visible:ring-2 focus-visible:ring-accent disabled:cursor-not-allowed disabled:opacity-50";

const Input = React.forwardRef<HTMLInputElement, React.ComponentProps<"input">>(({ className, ...props }, ref) => {
  return <input className={cn(fieldClassName, className)} ref={ref} {...props} />;
});
Input.displayName = "Input";

const Select = React.forwardRef<HTMLSelectElement, React.ComponentProps<"select">>(({ className, ...props }, ref) => {
  return <select className={cn(fieldClassName, "pr-8", className)} ref={ref} {...props} />;
});
Select.displayName = "Select";

export { Input, Select };
