import type { Metadata } from "next";

import "@/app/globals.css";
import "@fontsource/dm-sans/400.css";
import "@fontsource/dm-sans/500.css";
import "@fontsource/dm-sans/600.css";

export const metadata: Metadata = {
  title: "PE Portfolio Explorer",
  description: "Browse, filter and curate private-equity portfolio companies.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: React.ReactNode;
}>): React.JSX.Element {
  return (
    <html lang="en" className="dark">
      <body className="font-sans antialiased">{children}</body>
    </html>
  );
}
