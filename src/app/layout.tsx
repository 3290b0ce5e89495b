import type { Metadata } from "next";
import type { ReactNode } from "react";

export const metadata: Metadata = {
  title: "Valuation Desk",
  description: "DCF valuation and Black-Scholes option pricing for a single ticker.",
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body style={{ margin: 0, background: "#ffffff", color: "#111" }}>{children}</body>
    </html>
  );
}
