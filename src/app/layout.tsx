import type { Metadata, Viewport } from "next";
import type { ReactNode } from "react";

export const metadata: Metadata = {
  title: "Minefield",
  description: "Classic Minesweeper.",
};

export const viewport: Viewport = {
  themeColor: "#080c1a",
  width: "device-width",
  initialScale: 1,
};

export default function RootLayout({
  children,
}: Readonly<{
  children: ReactNode;
}>) {
  return (
    <html lang="en">
      <body style={{ margin: 0, background: "#080c1a", fontFamily: "system-ui, sans-serif" }}>
        {children}
      </body>
    </html>
  );
}
