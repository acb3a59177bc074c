/**
 * Stream extractor
 *
 * Wraps the yt-dlp binary. Each extraction runs in a child process and is
 * scheduled through a bounded queue so a burst of resolutions cannot spawn
 * an unbounded number of processes. Failures surface as plain `Error`s whose
 * message carries yt-dlp's own diagnostic; callers classify by message.
 */

import { spawn as nodeSpawn } from "child_process";
import PQueue from "p-queue";
import { config } from "../config";
import { logger, withLogTiming } from "../utils/logger";
import {
    isRecord,
    readNumber,
    readRecords,
    readString,
    type UnknownRecord,
} from "../utils/guards";

export interface ExtractorFormat {
    url: string | null;
    acodec: string | null;
    vcodec: string | null;
    abr: number | null;
    ext: string | null;
}

export interface ExtractorInfo {
    id: string | null;
    title: string | null;
    artist: string | null;
    uploader: string | null;
    channel: string | null;
    duration: number | null;
    thumbnail: string | null;
    thumbnails: UnknownRecord[];
    formats: ExtractorFormat[];
    adaptiveFormats: ExtractorFormat[];
    url: string | null;
}

export interface ExtractorQueueStats {
    pending: number;
    size: number;
}

export interface Extractor {
    extract(watchUrl: string): Promise<ExtractorInfo>;
    queueStats(): ExtractorQueueStats;
    drain(): Promise<void>;
}

export interface YtDlpExtractorOptions {
    binaryPath: string;
    socketTimeoutSeconds: number;
    retries: number;
    timeoutMs: number;
    maxWorkers: number;
}

export type SpawnFn = typeof nodeSpawn;

export function watchUrlFor(videoId: string): string {
    return `https://www.youtube.com/watch?v=${videoId}`;
}

function toFormat(entry: UnknownRecord): ExtractorFormat {
    return {
        url: readString(entry, "url"),
        acodec: readString(entry, "acodec"),
        vcodec: readString(entry, "vcodec"),
        abr: readNumber(entry, "abr"),
        ext: readString(entry, "ext"),
    };
}

/** Normalizes yt-dlp's `--dump-single-json` output. */
export function parseExtractorInfo(raw: unknown): ExtractorInfo {
    if (!isRecord(raw)) {
        throw new Error("Extractor returned an unexpected payload");
    }
    const duration = readNumber(raw, "duration");
    return {
        id: readString(raw, "id"),
        title: readString(raw, "title"),
        artist: readString(raw, "artist"),
        uploader: readString(raw, "uploader"),
        channel: readString(raw, "channel"),
        duration: duration === null ? null : Math.round(duration),
        thumbnail: readString(raw, "thumbnail"),
        thumbnails: readRecords(raw, "thumbnails"),
        formats: readRecords(raw, "formats").map(toFormat),
        adaptiveFormats: readRecords(raw, "adaptive_formats").map(toFormat),
        url: readString(raw, "url"),
    };
}

function lastLine(text: string): string | null {
    const lines = text
        .split(/\r?\n/)
        .map((line) => line.trim())
        .filter((line) => line.length > 0);
    return lines.length > 0 ? lines[lines.length - 1] : null;
}

export class YtDlpExtractor implements Extractor {
    private readonly queue: PQueue;
    private readonly log = logger.child("Extractor");

    constructor(
        private readonly options: YtDlpExtractorOptions,
        private readonly spawn: SpawnFn = nodeSpawn
    ) {
        this.queue = new PQueue({ concurrency: Math.max(1, options.maxWorkers) });
    }

    buildArgs(watchUrl: string): string[] {
        return [
            "--dump-single-json",
            "--no-playlist",
            "--no-warnings",
            "-f",
            "bestaudio/best",
            "--socket-timeout",
            String(this.options.socketTimeoutSeconds),
            "--retries",
            String(this.options.retries),
            "--extractor-args",
            "youtube:player_client=android",
            watchUrl,
        ];
    }

    extract(watchUrl: string): Promise<ExtractorInfo> {
        return this.queue.add(() =>
            withLogTiming(this.log, `yt-dlp ${watchUrl}`, () => this.run(watchUrl))
        );
    }

    queueStats(): ExtractorQueueStats {
        return { pending: this.queue.pending, size: this.queue.size };
    }

    async drain(): Promise<void> {
        await this.queue.onIdle();
    }

    private run(watchUrl: string): Promise<ExtractorInfo> {
        const startedAt = Date.now();
        return new Promise<ExtractorInfo>((resolve, reject) => {
            const proc = this.spawn(this.options.binaryPath, this.buildArgs(watchUrl), {
                stdio: ["ignore", "pipe", "pipe"],
            });

            let stdout = "";
            let stderr = "";
            let settled = false;

            const fail = (error: Error) => {
                if (settled) return;
                settled = true;
                clearTimeout(timeoutId);
                reject(error);
            };

            const timeoutId = setTimeout(() => {
                proc.kill("SIGKILL");
                fail(new Error(`Extraction timed out after ${this.options.timeoutMs}ms`));
            }, this.options.timeoutMs);

            proc.stdout?.on("data", (chunk: Buffer) => {
                stdout += chunk.toString("utf8");
            });

            proc.stderr?.on("data", (chunk: Buffer) => {
                stderr += chunk.toString("utf8");
            });

            proc.on("error", (error: Error) => {
                fail(new Error(`Failed to start ${this.options.binaryPath}: ${error.message}`));
            });

            proc.on("close", (code: number | null) => {
                if (settled) return;
                if (code !== 0) {
                    fail(new Error(lastLine(stderr) ?? `yt-dlp exited with code ${code}`));
                    return;
                }

                let info: ExtractorInfo;
                try {
                    info = parseExtractorInfo(JSON.parse(stdout));
                } catch (error) {
                    fail(
                        new Error(
                            `Extractor returned malformed output: ${
                                error instanceof Error ? error.message : String(error)
                            }`
                        )
                    );
                    return;
                }

                settled = true;
                clearTimeout(timeoutId);
                this.log.debug(`Extracted ${watchUrl}`, {
                    durationMs: Date.now() - startedAt,
                    formats: info.formats.length,
                });
                resolve(info);
            });
        });
    }
}

export const ytDlpExtractor = new YtDlpExtractor({
    binaryPath: config.extractor.binaryPath,
    socketTimeoutSeconds: config.extractor.socketTimeoutSeconds,
    retries: config.extractor.retries,
    timeoutMs: config.extractor.timeoutMs,
    maxWorkers: config.extractor.maxWorkers,
});
