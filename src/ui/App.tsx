import { useEffect, useRef, useState } from 'react';
import type { BabelLyrics } from '@/core/models/BabelLyrics';
import { PlaybackClock } from '@/core/services/PlaybackClock';
import type { PlayerState } from '@/core/services/PlaybackClock';
import { AudioLoader } from '@/core/services/AudioLoader';
import type { LoadedAudio } from '@/core/services/AudioLoader';
import { LyricsFileService } from '@/core/services/LyricsFileService';
import type { LoadedLyrics } from '@/core/services/LyricsFileService';
import { LyricsParseError } from '@/core/errors/LyricsParseError';
import { SettingsStore } from '@/core/config/SettingsStore';
import type { PlayerSettings } from '@/core/config/SettingsStore';
import { AUDIO_EXTENSIONS, Colors, DEFAULT_EXPORT_FILE_NAME, LOG_BUFFER_SIZE, LYRICS_JSON_EXTENSIONS, SEEK_DRAG_STEP_MS } from '@/core/config/PlayerConfig';
import { formatFileSize, formatTimestamp } from '@/core/utils/TimeFormat';
import { Logger } from '@/core/utils/Logger';
import type { LogEntry } from '@/core/utils/Logger';
import { DetailsGrid } from './components/DetailsGrid';
import { CaptionsWindow, LyricsWindow } from './components/LyricsDisplay';
import { LyricsEditorPanel } from './components/LyricsEditorPanel';

// Singleton instances for the app
const clock = new PlaybackClock();
const audioLoader = new AudioLoader();
const lyricsFiles = new LyricsFileService();
const settingsStore = new SettingsStore();

const FROM_EDITOR = 'From editor';

function describeError(e: unknown): string {
    if (e instanceof LyricsParseError) return e.details.length > 0 ? `${e.message} (${e.details[0]})` : e.message;
    return e instanceof Error ? e.message : String(e);
}

function exportNameFor(fileName: string | null): string {
    if (!fileName) return DEFAULT_EXPORT_FILE_NAME;
    const extIndex = fileName.lastIndexOf('.');
    return `${extIndex === -1 ? fileName : fileName.substring(0, extIndex)}.json`;
}

export default function App() {
    // Playback state
    const [audio, setAudio] = useState<LoadedAudio | null>(null);
    const [loadingAudio, setLoadingAudio] = useState(false);
    const [playerState, setPlayerState] = useState<PlayerState>(clock.getState());
    const [currentTime, setCurrentTime] = useState(0);

    // Lyrics being played
    const [lyrics, setLyrics] = useState<BabelLyrics | null>(null);
    const [lyricsFileName, setLyricsFileName] = useState<string | null>(null);
    const [loadingLyrics, setLoadingLyrics] = useState(false);

    // Lyrics being edited
    const [editorLyrics, setEditorLyrics] = useState<BabelLyrics | null>(null);
    const [editorFileName, setEditorFileName] = useState<string | null>(null);
    const [editorLoading, setEditorLoading] = useState(false);

    const [settings, setSettings] = useState<PlayerSettings>(() => settingsStore.load());
    const [statusMsg, setStatusMsg] = useState('');
    const [logs, setLogs] = useState<LogEntry[]>([]);

    const audioRef = useRef<HTMLAudioElement>(null);
    const logContainerRef = useRef<HTMLDivElement>(null);

    // Subscribe to Logger
    useEffect(() => {
        return Logger.subscribe((entry) => {
            setLogs(prev => {
                const newLogs = [...prev, entry];
                if (newLogs.length > LOG_BUFFER_SIZE) return newLogs.slice(newLogs.length - LOG_BUFFER_SIZE);
                return newLogs;
            });
        });
    }, []);

    // Auto-scroll logs
    useEffect(() => {
        if (logContainerRef.current) {
            logContainerRef.current.scrollTop = logContainerRef.current.scrollHeight;
        }
    }, [logs]);

    useEffect(() => {
        settingsStore.save(settings);
    }, [settings]);

    // The audio element follows the clock
    useEffect(() => {
        return clock.subscribe(event => {
            setPlayerState(event.state);
            setCurrentTime(event.timestamp);

            const element = audioRef.current;
            if (!element) return;
            if (event.seeked) {
                element.currentTime = event.timestamp / 1000;
            }
            if (event.state === 'playing') {
                element.play().catch(e => Logger.warn('[Player] Audio playback failed', e));
            } else {
                element.pause();
            }
        });
    }, []);

    // Repaint loop while playing
    useEffect(() => {
        if (playerState !== 'playing') return;
        let frame = requestAnimationFrame(function tick() {
            setCurrentTime(clock.getTimestamp());
            frame = requestAnimationFrame(tick);
        });
        return () => cancelAnimationFrame(frame);
    }, [playerState]);

    const updateSettings = (patch: Partial<PlayerSettings>) => setSettings(prev => ({ ...prev, ...patch }));

    const handleAudioSelect = async (file: File) => {
        setLoadingAudio(true);
        try {
            const loaded = await audioLoader.load(file);
            clock.reset();
            clock.setDuration(loaded.duration ?? null);
            setAudio(loaded);
            setStatusMsg(`Loaded ${loaded.fileName}`);
        } catch (e) {
            Logger.error(`[Player] Failed to load ${file.name}`, e);
            setStatusMsg(`Failed to load audio: ${describeError(e)}`);
        } finally {
            setLoadingAudio(false);
        }
    };

    const showLyrics = (loaded: LoadedLyrics) => {
        setLyrics(loaded.lyrics);
        setLyricsFileName(loaded.fileName);
        updateSettings({ showLyricsWindow: true, showCaptionsWindow: true });
    };

    const handleLyricsSelect = async (file: File) => {
        setLoadingLyrics(true);
        try {
            showLyrics(await lyricsFiles.loadJson(file));
            setStatusMsg(`Loaded lyrics ${file.name}`);
        } catch (e) {
            setStatusMsg(`Failed to load lyrics: ${describeError(e)}`);
        } finally {
            setLoadingLyrics(false);
        }
    };

    const handleLoadFromEditor = () => {
        if (!editorLyrics) return;
        showLyrics({ lyrics: editorLyrics, fileName: FROM_EDITOR });
        setStatusMsg('Loaded lyrics from editor');
    };

    const loadIntoEditor = async (file: File, load: (file: File) => Promise<LoadedLyrics>) => {
        setEditorLoading(true);
        try {
            const loaded = await load(file);
            setEditorLyrics(loaded.lyrics);
            setEditorFileName(loaded.fileName);
            setStatusMsg(`Opened ${file.name} in the editor`);
        } catch (e) {
            setStatusMsg(`Failed to open ${file.name}: ${describeError(e)}`);
        } finally {
            setEditorLoading(false);
        }
    };

    const handleExport = () => {
        if (!editorLyrics) return;
        try {
            lyricsFiles.exportJson(editorLyrics, exportNameFor(editorFileName));
        } catch (e) {
            Logger.error('[Editor] Export failed', e);
            setStatusMsg(`Export failed: ${describeError(e)}`);
        }
    };

    const duration = audio?.duration;

    return (
        <div className="app-container" style={{ padding: '20px', maxWidth: '900px', margin: '0 auto', textAlign: 'center' }}>
            <h1>Babel Player</h1>

            {/* Audio */}
            <div style={{ marginBottom: '16px', border: '1px dashed #666', padding: '10px', textAlign: 'left' }}>
                <label style={{ display: 'block', marginBottom: '5px', color: '#888' }}>
                    Select Audio File{' '}
                    <input
                        type="file"
                        accept={AUDIO_EXTENSIONS.join(',')}
                        disabled={loadingAudio}
                        onChange={e => {
                            const file = e.target.files?.[0];
                            if (file) void handleAudioSelect(file);
                        }}
                    />
                    {loadingAudio && <span style={{ marginLeft: '8px' }}>Loading…</span>}
                </label>
                <DetailsGrid rows={[
                    ['File name', audio?.fileName ?? '-'],
                    ['File size', audio ? formatFileSize(audio.fileSize) : '-'],
                    ['File data', audio ? '✓ In memory' : '-']
                ]} />
                {audio && (
                    <audio
                        ref={audioRef}
                        src={audio.url}
                        preload="auto"
                        onEnded={() => clock.pause()}
                        onError={() => {
                            Logger.error(`[Player] Cannot play ${audio.fileName}`, audioRef.current?.error?.message);
                            setStatusMsg(`Error playing audio: ${audioRef.current?.error?.message || 'Unknown error'}`);
                        }}
                    />
                )}
            </div>

            {/* Lyrics */}
            <div style={{ marginBottom: '16px', border: '1px dashed #666', padding: '10px', textAlign: 'left' }}>
                <div style={{ display: 'flex', gap: '10px', alignItems: 'center', marginBottom: '8px' }}>
                    <label>
                        <input
                            type="checkbox"
                            checked={settings.showLyricsEditor}
                            onChange={e => updateSettings({ showLyricsEditor: e.target.checked })}
                        />
                        Lyrics editor
                    </label>
                    <button disabled={!editorLyrics} onClick={handleLoadFromEditor}>Load from editor</button>
                </div>
                <label style={{ display: 'block', marginBottom: '5px', color: '#888' }}>
                    Select lyrics file{' '}
                    <input
                        type="file"
                        accept={LYRICS_JSON_EXTENSIONS.join(',')}
                        disabled={loadingLyrics}
                        onChange={e => {
                            const file = e.target.files?.[0];
                            if (file) void handleLyricsSelect(file);
                        }}
                    />
                    {loadingLyrics && <span style={{ marginLeft: '8px' }}>Loading…</span>}
                </label>
                <DetailsGrid rows={[
                    ['File name', lyricsFileName ?? '-'],
                    ['Lyrics data', lyrics ? '✓ In memory' : '-']
                ]} />
                {lyrics && (
                    <div style={{ marginTop: '8px' }}>
                        <label style={{ marginRight: '12px' }}>
                            <input
                                type="checkbox"
                                checked={settings.showLyricsWindow}
                                onChange={e => updateSettings({ showLyricsWindow: e.target.checked })}
                            />
                            Main lyrics window
                        </label>
                        <label>
                            <input
                                type="checkbox"
                                checked={settings.showCaptionsWindow}
                                onChange={e => updateSettings({ showCaptionsWindow: e.target.checked })}
                            />
                            Captions window
                        </label>
                    </div>
                )}
            </div>

            {/* Transport */}
            <div style={{ marginBottom: '16px', display: 'flex', gap: '10px', alignItems: 'center', justifyContent: 'center' }}>
                <input
                    type="range"
                    min={0}
                    max={duration ?? Math.max(currentTime, lyrics?.lyrics.lines.reduce((max, line) => Math.max(max, line.end), 0) ?? 0)}
                    step={SEEK_DRAG_STEP_MS}
                    value={currentTime}
                    onChange={e => clock.seek(Number(e.target.value))}
                    style={{ flex: 1 }}
                />
                <span style={{ fontFamily: 'monospace' }}>{formatTimestamp(currentTime)}</span>
                <span style={{ color: Colors.GRAY_500 }}>/</span>
                <span style={{ fontFamily: 'monospace' }}>{duration !== undefined ? formatTimestamp(duration) : '???'}</span>
            </div>
            <div style={{ marginBottom: '10px' }}>
                {playerState === 'stopped' && <button onClick={() => clock.play()}>Play</button>}
                {playerState === 'paused' && <button onClick={() => clock.resume()}>Resume</button>}
                {playerState === 'playing' && <button onClick={() => clock.pause()}>Pause</button>}
                {playerState !== 'stopped' && <button onClick={() => clock.reset()} style={{ marginLeft: '10px' }}>Reset</button>}
            </div>

            <div style={{ color: '#aaa', marginBottom: '10px' }}>{statusMsg}</div>

            {lyrics && settings.showCaptionsWindow && <CaptionsWindow lyrics={lyrics} currentTime={currentTime} />}
            {lyrics && settings.showLyricsWindow && <LyricsWindow lyrics={lyrics} currentTime={currentTime} />}

            {settings.showLyricsEditor && (
                <LyricsEditorPanel
                    lyrics={editorLyrics}
                    fileName={editorFileName}
                    loading={editorLoading}
                    onChange={setEditorLyrics}
                    onImportTtml={file => void loadIntoEditor(file, f => lyricsFiles.loadTtml(f))}
                    onSelectJson={file => void loadIntoEditor(file, f => lyricsFiles.loadJson(f))}
                    onExport={handleExport}
                />
            )}

            {/* Logs Viewer */}
            <div className="log-viewer" style={{
                marginTop: '20px',
                textAlign: 'left',
                border: '1px solid #333',
                background: '#111',
                padding: '10px',
                borderRadius: '4px'
            }}>
                <div style={{ fontSize: '0.8em', color: '#888', borderBottom: '1px solid #333', marginBottom: '5px', paddingBottom: '2px' }}>
                    Application Logs (Latest {LOG_BUFFER_SIZE})
                </div>
                <div
                    ref={logContainerRef}
                    style={{ maxHeight: '150px', overflowY: 'auto', fontFamily: 'monospace', fontSize: '12px' }}
                >
                    {logs.map((log, i) => (
                        <div key={i} style={{ color: log.level === 'error' ? '#f44336' : log.level === 'warn' ? '#ff9800' : '#8bc34a', marginBottom: '2px' }}>
                            <span style={{ color: '#555', marginRight: '5px' }}>[{new Date(log.timestamp).toLocaleTimeString()}]</span>
                            <span style={{ fontWeight: 'bold', marginRight: '5px' }}>[{log.level.toUpperCase()}]</span>
                            {log.message}
                            {log.data !== undefined && <span style={{ color: '#aaa', marginLeft: '5px' }}>{JSON.stringify(log.data)}</span>}
                        </div>
                    ))}
                    {logs.length === 0 && <div style={{ color: '#555', fontStyle: 'italic' }}>No logs yet...</div>}
                </div>
            </div>
        </div>
    );
}
