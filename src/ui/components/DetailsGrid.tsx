import React from 'react';

interface DetailsGridProps {
    rows: [label: string, value: React.ReactNode][];
}

/**
 * Two-column label/value grid used for the file details blocks.
 */
export const DetailsGrid: React.FC<DetailsGridProps> = ({ rows }) => (
    <div style={{ display: 'grid', gridTemplateColumns: 'max-content 1fr', gap: '4px 16px', fontSize: '0.9em', textAlign: 'left' }}>
        {rows.map(([label, value]) => (
            <React.Fragment key={label}>
                <span style={{ color: '#888' }}>{label}</span>
                <span>{value}</span>
            </React.Fragment>
        ))}
    </div>
);
