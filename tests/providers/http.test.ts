import { describe, it, expect, afterEach, vi } from 'vitest';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import * as Http from '@/providers/http';
import { LocalProcessingError, ProviderRejectedError, SourceUnavailableError, TransientNetworkError } from '@/errors';
import { tempDir } from '../fakes';

const FEED = `<?xml version="1.0"?>
<rss version="2.0" xmlns:itunes="http://www.itunes.com/dtds/podcast-1.0.dtd">
<channel>
  <title>Test Show</title>
  <item>
    <title><![CDATA[Episode &amp; One]]></title>
    <link>https://example.com/1</link>
    <itunes:author>Host</itunes:author>
    <pubDate>Mon, 01 Jan 2024 10:00:00 GMT</pubDate>
    <itunes:duration>1:02:03</itunes:duration>
    <description>About one</description>
    <enclosure url="https://cdn.example.com/1.mp3" type="audio/mpeg" length="1"/>
  </item>
  <item>
    <title>No audio</title>
  </item>
  <item>
    <title>Episode Two</title>
    <enclosure url="https://cdn.example.com/2.mp3" type="audio/mpeg"/>
  </item>
</channel>
</rss>`;

describe('http adapters', () => {
    afterEach(() => {
        vi.unstubAllGlobals();
    });

    describe('parseFeed', () => {
        it('reads the channel title and every episode with audio', () => {
            const feed = Http.parseFeed(FEED);

            expect(feed.title).toBe('Test Show');
            expect(feed.episodes).toHaveLength(2);
            expect(feed.episodes[0]).toEqual({
                title: 'Episode & One',
                audioUrl: 'https://cdn.example.com/1.mp3',
                link: 'https://example.com/1',
                author: 'Host',
                publishedAt: '2024-01-01T10:00:00.000Z',
                durationSeconds: 3723,
                description: 'About one',
            });
            expect(feed.episodes[1]).toMatchObject({ title: 'Episode Two', audioUrl: 'https://cdn.example.com/2.mp3' });
            expect(feed.episodes[1].publishedAt).toBeUndefined();
        });

        it('returns no episodes for an empty channel', () => {
            expect(Http.parseFeed('<rss><channel><title>Empty</title></channel></rss>')).toEqual({ title: 'Empty', episodes: [] });
        });
    });

    it('reads itunes durations in seconds', () => {
        expect(Http.parseItunesDuration('90')).toBe(90);
        expect(Http.parseItunesDuration('1:30')).toBe(90);
        expect(Http.parseItunesDuration('1:00:00')).toBe(3600);
        expect(Http.parseItunesDuration('soon')).toBeUndefined();
        expect(Http.parseItunesDuration(undefined)).toBeUndefined();
    });

    it('strips markup, scripts and navigation from pages', () => {
        const html = '<html><head><script>track()</script></head><body><nav>Menu</nav><p>Hello <a href="/x">world</a></p></body></html>';

        expect(Http.stripHtml(html)).toBe('Hello world');
    });

    describe('createFeedReader', () => {
        const respond = (body: string, status: number) => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(body, { status })));
        };

        it('parses the fetched feed', async () => {
            respond(FEED, 200);

            const feed = await Http.createFeedReader().read('https://example.com/feed.xml');

            expect(feed.episodes.map((e) => e.title)).toEqual(['Episode & One', 'Episode Two']);
        });

        it('sorts HTTP failures into the error categories', async () => {
            const reader = Http.createFeedReader();

            respond('', 404);
            await expect(reader.read('https://example.com/feed.xml')).rejects.toBeInstanceOf(SourceUnavailableError);
            respond('', 503);
            await expect(reader.read('https://example.com/feed.xml')).rejects.toBeInstanceOf(TransientNetworkError);
            respond('', 403);
            await expect(reader.read('https://example.com/feed.xml')).rejects.toThrow(ProviderRejectedError);
        });
    });

    describe('createEpisodeDownloader', () => {
        const stream = (chunks: string[], failure?: Error) => new ReadableStream<Uint8Array>({
            start(controller) {
                for (const chunk of chunks) controller.enqueue(new TextEncoder().encode(chunk));
                if (failure) controller.error(failure);
                else controller.close();
            },
        });

        it('streams the episode to a file named after the stem', async () => {
            const dir = await tempDir('download-test');
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(stream(['part one, ', 'part two']), { status: 200 })));

            const downloaded = await Http.createEpisodeDownloader().download('https://cdn.example.com/ep1.m4a', dir, 'ep1');

            expect(downloaded).toEqual({ path: path.join(dir, 'ep1.m4a') });
            expect(await fs.readFile(downloaded.path, 'utf-8')).toBe('part one, part two');
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('removes the partial file when the body breaks off', async () => {
            const dir = await tempDir('download-test');
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(stream(['part one'], new Error('connection reset')), { status: 200 })));

            await expect(Http.createEpisodeDownloader().download('https://cdn.example.com/ep1.mp3', dir, 'ep1')).rejects.toThrow('connection reset');
            expect(await fs.readdir(dir)).toEqual([]);
            await fs.rm(dir, { recursive: true, force: true });
        });
    });

    describe('createDocumentExtractor', () => {
        it('extracts text and title from a web page', async () => {
            vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response(
                '<html><head><title>A Page</title></head><body><p>Body text</p></body></html>',
                { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } },
            )));

            const result = await Http.createDocumentExtractor().extract('https://example.com/page');

            expect(result).toEqual({ text: 'Body text', metadata: { title: 'A Page', sourceUrl: 'https://example.com/page' } });
        });

        it('refuses binary formats it cannot read', async () => {
            const dir = await tempDir('extract-test');
            const slides = path.join(dir, 'deck.pptx');
            await fs.writeFile(slides, 'PK');

            await expect(Http.createDocumentExtractor().extract(slides)).rejects.toThrow(SourceUnavailableError);
            await expect(Http.createDocumentExtractor().extract(slides)).rejects.toThrow(`Unsupported document type .pptx: ${slides}`);
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('reports a damaged Word document as a local processing failure', async () => {
            const dir = await tempDir('extract-test');
            const document = path.join(dir, 'notes.docx');
            await fs.writeFile(document, 'not a zip archive');

            const extracting = Http.createDocumentExtractor().extract(document);

            await expect(extracting).rejects.toThrow(LocalProcessingError);
            await expect(extracting).rejects.toThrow(`Could not read DOCX ${document}:`);
            await fs.rm(dir, { recursive: true, force: true });
        });

        it('fails for a missing local file', async () => {
            await expect(Http.createDocumentExtractor().extract('/no/such/file.txt')).rejects.toThrow('Document not found: /no/such/file.txt');
        });
    });
});
