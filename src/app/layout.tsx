import type { Metadata } from 'next';
import type { ReactNode } from 'react';
import { ErrorBoundary } from '@/lib/components/ErrorBoundary';
import './globals.css';

export const metadata: Metadata = {
  title: 'Knowledge Tree Explorer',
  description: 'Research a topic on the web and organize it into a knowledge tree',
};

export default function RootLayout({ children }: { children: ReactNode }) {
  return (
    <html lang="en">
      <body className="bg-white text-gray-900 antialiased">
        <ErrorBoundary>{children}</ErrorBoundary>
      </body>
    </html>
  );
}
