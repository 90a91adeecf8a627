/**
 * Concrete collaborators for a real run: OpenAI-compatible APIs, yt-dlp,
 * ffmpeg and plain HTTP.
 */

import * as Logging from '@/logging';
import * as Media from '@/util/media';
import type { AcquisitionServices } from '@/acquisition';
import type { ExpansionServices } from '@/input';
import type { RefinementServices } from '@/refinement';
import * as Clients from './clients';
import * as Transcriber from './transcriber';
import * as Llm from './llm';
import * as YtDlp from './ytdlp';
import * as Http from './http';

export { credentialsFromEnv } from './clients';
export type { Credentials, ClientFactory } from './clients';

export interface Services {
    expansion: ExpansionServices;
    acquisition: AcquisitionServices;
    refinement: RefinementServices;
}

export const create = (credentials: Clients.Credentials, tempDir: string): Services => {
    const clients = Clients.create(credentials);
    return {
        expansion: {
            streaming: YtDlp.createLister(),
            feeds: Http.createFeedReader(),
        },
        acquisition: {
            captions: YtDlp.createCaptionFetcher(tempDir),
            streamingDownloader: YtDlp.createDownloader(),
            episodeDownloader: Http.createEpisodeDownloader(),
            audio: Media.create(Logging.getLogger()),
            transcriber: Transcriber.create(clients),
            documents: Http.createDocumentExtractor(),
        },
        refinement: {
            llm: Llm.create(clients),
        },
    };
};
