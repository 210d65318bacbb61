import "./globals.css";
import type { ReactNode } from "react";

/**
 * Next.js App Router root layout. The app is a single page (`app/page.tsx`).
 */
export const metadata = {
  title: "Study Assistant",
  description: "Ask questions about Cloud Computing, DevOps and AWS"
};

export default function RootLayout({
  children
}: {
  children: ReactNode;
}) {
  return (
    <html lang="en">
      <body>{children}</body>
    </html>
  );
}
