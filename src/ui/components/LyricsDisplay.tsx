import React, { useEffect, useMemo, useRef } from 'react';
import type { BabelLyrics } from '../../core/models/BabelLyrics';
import type { CaptionLine } from '../../core/services/PlaybackSynchronizer';
import { PlaybackSynchronizer } from '../../core/services/PlaybackSynchronizer';
import { Colors } from '../../core/config/PlayerConfig';

const synchronizer = new PlaybackSynchronizer();

const panelStyle: React.CSSProperties = {
    border: '1px solid #444',
    background: '#1a1a1a',
    padding: '16px',
    borderRadius: '8px',
    marginTop: '16px',
    textAlign: 'left'
};

function CaptionRow({ line }: { line: CaptionLine }) {
    return (
        <div style={{ marginBottom: '8px' }}>
            <div style={{ whiteSpace: 'pre-wrap' }}>
                {line.segments.map((segment, idx) => (
                    <span
                        key={idx}
                        style={{
                            color: !line.active ? Colors.GRAY_700 : segment.highlighted ? Colors.ORANGE_500 : undefined
                        }}
                    >
                        {segment.text}
                    </span>
                ))}
            </div>
            {line.translations.map(translation => (
                <div key={translation.languageId} title={translation.language} style={{ whiteSpace: 'pre-wrap', fontSize: '0.9em' }}>
                    {translation.words.map((word, idx) => (
                        <span key={idx} style={{ color: word.highlighted ? Colors.ORANGE_500 : Colors.GRAY_500 }}>
                            {word.text}
                        </span>
                    ))}
                </div>
            ))}
        </div>
    );
}

/**
 * Every line of the document; active lines carry their translations.
 */
export function LyricsWindow({ lyrics, currentTime }: { lyrics: BabelLyrics; currentTime: number }) {
    const containerRef = useRef<HTMLDivElement>(null);
    const lines = synchronizer.buildLyricsView(lyrics, currentTime);
    const anchorIndex = useMemo(() => synchronizer.findLineIndex(lyrics, currentTime), [lyrics, currentTime]);

    useEffect(() => {
        const container = containerRef.current;
        if (anchorIndex === -1 || !container) return;
        const anchor = container.children[anchorIndex];
        if (anchor instanceof HTMLElement) {
            anchor.scrollIntoView({ behavior: 'smooth', block: 'center' });
        }
    }, [anchorIndex]);

    return (
        <div style={{ ...panelStyle, maxHeight: '400px', overflowY: 'auto' }}>
            <h3 style={{ marginTop: 0 }}>Lyrics</h3>
            <div ref={containerRef}>
                {lines.map(line => <CaptionRow key={line.uuid} line={line} />)}
            </div>
        </div>
    );
}

/**
 * Only the lines being sung, with a progress bar per line.
 */
export function CaptionsWindow({ lyrics, currentTime }: { lyrics: BabelLyrics; currentTime: number }) {
    const captions = synchronizer.buildCaptions(lyrics, currentTime);

    return (
        <div style={{ ...panelStyle, minHeight: '80px', fontSize: '1.2em' }}>
            {captions.map(line => (
                <div key={line.uuid}>
                    <CaptionRow line={line} />
                    <div style={{ height: '2px', background: '#333', marginBottom: '8px' }}>
                        <div style={{ height: '100%', width: `${line.progress * 100}%`, background: Colors.ORANGE_500 }} />
                    </div>
                </div>
            ))}
        </div>
    );
}
