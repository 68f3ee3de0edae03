import React from 'react';
import type { Metadata, Viewport } from 'next';
import './globals.css';

export const metadata: Metadata = {
    title: 'Daily Log',
    description: 'Daily habit log kept as a CSV file in a GitHub repository.',
};

export const viewport: Viewport = {
    themeColor: '#10b981',
};

export default function RootLayout({
    children,
}: {
    children: React.ReactNode;
}) {
    return (
        <html lang="en" className="dark">
            <body className="bg-zinc-950">{children}</body>
        </html>
    );
}
