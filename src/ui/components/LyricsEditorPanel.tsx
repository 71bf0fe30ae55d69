import React from 'react';
import type { BabelLyrics, LyricsLine } from '../../core/models/BabelLyrics';
import { LyricsEditor } from '../../core/services/LyricsEditor';
import { composeTimestamp, splitTimestamp } from '../../core/utils/TimeFormat';
import type { TimestampParts } from '../../core/utils/TimeFormat';
import { Colors, LYRICS_JSON_EXTENSIONS, TTML_EXTENSIONS } from '../../core/config/PlayerConfig';
import { DetailsGrid } from './DetailsGrid';

const editor = new LyricsEditor();

interface LyricsEditorPanelProps {
    lyrics: BabelLyrics | null;
    fileName: string | null;
    loading: boolean;
    onChange: (lyrics: BabelLyrics) => void;
    onImportTtml: (file: File) => void;
    onSelectJson: (file: File) => void;
    onExport: () => void;
}

const smallButton: React.CSSProperties = { padding: '0 6px', marginRight: '2px' };

function Space() {
    return <span style={{ color: Colors.GRAY_500 }}>(space)</span>;
}

function pickedFile(e: React.ChangeEvent<HTMLInputElement>): File | null {
    const file = e.target.files?.[0] ?? null;
    e.target.value = '';
    return file;
}

function TimestampInput({ value, onChange }: { value: number; onChange: (ms: number) => void }) {
    const parts = splitTimestamp(value);
    const update = (key: keyof TimestampParts, fieldValue: number) => {
        const next: TimestampParts = { ...parts };
        next[key] = fieldValue;
        onChange(composeTimestamp(next));
    };
    const field = (key: keyof TimestampParts, max: number, suffix: string) => (
        <label style={{ marginRight: '4px' }}>
            <input
                type="number"
                min={0}
                max={max}
                value={parts[key]}
                onChange={e => update(key, parseInt(e.target.value, 10) || 0)}
                style={{ width: key === 'milliseconds' ? '52px' : '40px' }}
            />
            {suffix}
        </label>
    );

    return (
        <span style={{ whiteSpace: 'nowrap' }}>
            {field('minutes', 59, 'm')}
            {field('seconds', 59, 's')}
            {field('milliseconds', 999, '')}
        </span>
    );
}

function TranslationLanguages({ lyrics, onChange }: { lyrics: BabelLyrics; onChange: (lyrics: BabelLyrics) => void }) {
    return (
        <details>
            <summary>Translations</summary>
            {lyrics.metadata.translations.map(entry => (
                <div key={entry.id} style={{ margin: '4px 0' }}>
                    <button style={smallButton} title="Delete language" onClick={() => onChange(editor.removeLanguage(lyrics, entry.id))}>✕</button>
                    <input
                        value={entry.language}
                        placeholder="Language"
                        onChange={e => onChange(editor.renameLanguage(lyrics, entry.id, e.target.value))}
                    />
                    <span style={{ marginLeft: '8px', color: Colors.GRAY_500, fontFamily: 'monospace', fontSize: '0.8em' }}>{entry.id}</span>
                </div>
            ))}
            <button onClick={() => onChange(editor.addLanguage(lyrics).lyrics)}>Add Language</button>
        </details>
    );
}

/**
 * Word list of one language plus the segment/word link grid.
 */
function LineTranslationGrid({ lyrics, line, langId, onChange }: {
    lyrics: BabelLyrics;
    line: LyricsLine;
    langId: string;
    onChange: (lyrics: BabelLyrics) => void;
}) {
    const words = line.translations.find(([id]) => id === langId)?.[1] ?? [];
    const language = lyrics.metadata.translations.find(entry => entry.id === langId)?.language ?? '';

    return (
        <details style={{ marginLeft: '12px' }}>
            <summary>{language || <span style={{ color: Colors.GRAY_500 }}>(unnamed)</span>}</summary>
            <table style={{ borderCollapse: 'collapse' }}>
                <thead>
                    <tr>
                        <th style={{ textAlign: 'left', color: '#888' }}>(Original)</th>
                        {words.map((word, index) => (
                            <th key={index}>
                                <button style={smallButton} title="Delete word" onClick={() => onChange(editor.removeTranslationWord(lyrics, line.uuid, langId, index))}>✕</button>
                                {word === ' ' ? <Space /> : (
                                    <input
                                        value={word}
                                        onChange={e => onChange(editor.setTranslationWord(lyrics, line.uuid, langId, index, e.target.value))}
                                        style={{ width: '80px' }}
                                    />
                                )}
                            </th>
                        ))}
                        <th>
                            <button onClick={() => onChange(editor.addTranslationWord(lyrics, line.uuid, langId))}>+</button>
                        </th>
                    </tr>
                </thead>
                <tbody>
                    {line.original.map((segment, segmentIndex) => {
                        const linked = segment.translations.find(([id]) => id === langId)?.[1] ?? [];
                        return (
                            <tr key={segmentIndex} style={{ background: segmentIndex % 2 === 0 ? '#222' : 'transparent' }}>
                                <td>{segment.text === ' ' ? <Space /> : segment.text}</td>
                                {words.map((_, wordIndex) => (
                                    <td key={wordIndex} style={{ textAlign: 'center' }}>
                                        <input
                                            type="checkbox"
                                            checked={linked.includes(wordIndex)}
                                            onChange={e => onChange(editor.setSegmentLink(lyrics, line.uuid, segmentIndex, langId, wordIndex, e.target.checked))}
                                        />
                                    </td>
                                ))}
                                <td />
                            </tr>
                        );
                    })}
                </tbody>
            </table>
        </details>
    );
}

function SegmentGrid({ lyrics, line, onChange }: { lyrics: BabelLyrics; line: LyricsLine; onChange: (lyrics: BabelLyrics) => void }) {
    const count = line.original.length;

    return (
        <table>
            <thead>
                <tr style={{ color: '#888', textAlign: 'left' }}>
                    <th>Options</th>
                    <th>Start</th>
                    <th>End</th>
                    <th>Text</th>
                </tr>
            </thead>
            <tbody>
                {line.original.map((segment, index) => (
                    <tr key={index}>
                        <td style={{ whiteSpace: 'nowrap' }}>
                            <button style={smallButton} title="Delete" onClick={() => onChange(editor.removeSegment(lyrics, line.uuid, index))}>✕</button>
                            <button style={smallButton} title="Insert after" onClick={() => onChange(editor.insertSegment(lyrics, line.uuid, index + 1))}>+</button>
                            {index !== 0 && (
                                <button style={smallButton} title="Move up" onClick={() => onChange(editor.moveSegment(lyrics, line.uuid, index, index - 1))}>↑</button>
                            )}
                            {index !== count - 1 && (
                                <button style={smallButton} title="Move down" onClick={() => onChange(editor.moveSegment(lyrics, line.uuid, index, index + 1))}>↓</button>
                            )}
                        </td>
                        <td><TimestampInput value={segment.begin} onChange={ms => onChange(editor.setSegmentBegin(lyrics, line.uuid, index, ms))} /></td>
                        <td><TimestampInput value={segment.end} onChange={ms => onChange(editor.setSegmentEnd(lyrics, line.uuid, index, ms))} /></td>
                        <td>
                            {segment.text === ' ' ? <Space /> : (
                                <input
                                    value={segment.text}
                                    onChange={e => onChange(editor.setSegmentText(lyrics, line.uuid, index, e.target.value))}
                                    style={{ width: '200px' }}
                                />
                            )}
                        </td>
                    </tr>
                ))}
            </tbody>
            <tfoot>
                <tr>
                    <td colSpan={4}>
                        {count === 0 && <button onClick={() => onChange(editor.insertSegment(lyrics, line.uuid, 0))}>+ Add Segment</button>}
                    </td>
                </tr>
            </tfoot>
        </table>
    );
}

function LineEditor({ lyrics, line, onChange }: { lyrics: BabelLyrics; line: LyricsLine; onChange: (lyrics: BabelLyrics) => void }) {
    const title = line.original.map(segment => segment.text).join('');

    return (
        <details style={{ borderBottom: '1px solid #333', padding: '4px 0' }}>
            <summary>{title || <span style={{ color: Colors.GRAY_500 }}>(empty line)</span>}</summary>
            <div style={{ padding: '4px 12px' }}>
                <div style={{ marginBottom: '6px' }}>
                    <label>
                        Agent{' '}
                        <input value={line.agent_id} onChange={e => onChange(editor.setLineAgent(lyrics, line.uuid, e.target.value))} />
                    </label>
                    <button style={{ marginLeft: '8px' }} onClick={() => onChange(editor.removeLine(lyrics, line.uuid))}>Delete Line</button>
                </div>
                <div style={{ marginBottom: '6px' }}>
                    Line{' '}
                    <TimestampInput value={line.begin} onChange={ms => onChange(editor.setLineTiming(lyrics, line.uuid, ms, line.end))} />
                    {' – '}
                    <TimestampInput value={line.end} onChange={ms => onChange(editor.setLineTiming(lyrics, line.uuid, line.begin, ms))} />
                    <button onClick={() => onChange(editor.fitLineToSegments(lyrics, line.uuid))}>Fit to segments</button>
                </div>
                <details>
                    <summary>Translation</summary>
                    {line.translations.map(([langId]) => (
                        <LineTranslationGrid key={langId} lyrics={lyrics} line={line} langId={langId} onChange={onChange} />
                    ))}
                </details>
                <hr style={{ borderColor: '#333' }} />
                <SegmentGrid lyrics={lyrics} line={line} onChange={onChange} />
            </div>
        </details>
    );
}

export const LyricsEditorPanel: React.FC<LyricsEditorPanelProps> = ({ lyrics, fileName, loading, onChange, onImportTtml, onSelectJson, onExport }) => {
    return (
        <div style={{ border: '1px solid #444', background: '#1a1a1a', padding: '16px', borderRadius: '8px', marginTop: '16px', textAlign: 'left' }}>
            <h3 style={{ marginTop: 0 }}>Lyrics Editor</h3>
            <div style={{ display: 'flex', gap: '12px', alignItems: 'center', flexWrap: 'wrap' }}>
                <label title="Import an AMLL TTML file to edit lyrics. AMLL TTML Tool can create a word-by-word lyrics file first.">
                    Import AMLL TTML{' '}
                    <input
                        type="file"
                        accept={TTML_EXTENSIONS.join(',')}
                        disabled={loading}
                        onChange={e => {
                            const file = pickedFile(e);
                            if (file) onImportTtml(file);
                        }}
                    />
                </label>
                <label>
                    Select lyrics file{' '}
                    <input
                        type="file"
                        accept={LYRICS_JSON_EXTENSIONS.join(',')}
                        disabled={loading}
                        onChange={e => {
                            const file = pickedFile(e);
                            if (file) onSelectJson(file);
                        }}
                    />
                </label>
                {loading && <span>Loading…</span>}
                <a href="https://steve-xmh.github.io/amll-ttml-tool/" target="_blank" rel="noreferrer" style={{ color: Colors.BLUE_300 }}>
                    [ AMLL TTML Tool ]
                </a>
            </div>
            <div style={{ margin: '8px 0' }}>
                <button disabled={!lyrics} onClick={onExport}>Export Babel Lyrics</button>
            </div>
            <hr style={{ borderColor: '#333' }} />
            <DetailsGrid rows={[
                ['File name', fileName ?? '-'],
                ['Lyrics data', lyrics ? '✓ In memory' : '-']
            ]} />
            <hr style={{ borderColor: '#333' }} />
            {lyrics && (
                <div style={{ maxHeight: '500px', overflowY: 'auto' }}>
                    <TranslationLanguages lyrics={lyrics} onChange={onChange} />
                    <hr style={{ borderColor: '#333' }} />
                    {lyrics.lyrics.lines.map(line => (
                        <LineEditor key={line.uuid} lyrics={lyrics} line={line} onChange={onChange} />
                    ))}
                    <button style={{ marginTop: '8px' }} onClick={() => onChange(editor.addLine(lyrics))}>+ Add Line</button>
                </div>
            )}
        </div>
    );
};
