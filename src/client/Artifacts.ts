import { WorkflowGraph } from '../core/GraphPrimitives';
import { debug } from '../core/log';
import { ArtifactKind, MediaArtifact, NodeGraph } from '../core/Types';
import { HistoryEntry, NodeOutput, OUTPUT_KEYS, OutputFile } from './Protocol';

export const OCTET_STREAM = 'application/octet-stream';

const IMAGE_MIME: Record<string, string> = {
  png: 'image/png',
  jpg: 'image/jpeg',
  jpeg: 'image/jpeg',
  webp: 'image/webp',
  bmp: 'image/bmp',
  tif: 'image/tiff',
  tiff: 'image/tiff',
};

const VIDEO_MIME: Record<string, string> = {
  mp4: 'video/mp4',
  m4v: 'video/mp4',
  webm: 'video/webm',
  mov: 'video/quicktime',
  mkv: 'video/x-matroska',
  gif: 'image/gif',
};

const AUDIO_MIME: Record<string, string> = {
  flac: 'audio/flac',
  wav: 'audio/wav',
  mp3: 'audio/mpeg',
  m4a: 'audio/aac',
  aac: 'audio/aac',
  ogg: 'audio/ogg',
  oga: 'audio/ogg',
};

const MIME_TABLES: Record<ArtifactKind, Record<string, string>> = {
  [ArtifactKind.IMAGE]: IMAGE_MIME,
  [ArtifactKind.VIDEO]: VIDEO_MIME,
  [ArtifactKind.AUDIO]: AUDIO_MIME,
};

export function guessMimeType(filename: string, kind: ArtifactKind): string {
  const dot = filename.lastIndexOf('.');
  if (dot < 0) return OCTET_STREAM;
  const ext = filename.slice(dot + 1).toLowerCase();
  return MIME_TABLES[kind][ext] ?? OCTET_STREAM;
}

/**
 * Node classes that mark a node's outputs as final images or videos.
 * Audio is recognised by output field alone.
 */
export interface SaveNodeClasses {
  image: string[];
  video: string[];
}

export const DEFAULT_SAVE_CLASSES: SaveNodeClasses = {
  image: ['SaveImage'],
  video: ['SaveVideo'],
};

export function viewUrl(baseUrl: string, file: OutputFile): string {
  const query = new URLSearchParams({
    filename: file.filename,
    subfolder: file.subfolder,
    type: file.type,
  });
  return `${baseUrl}/view?${query.toString()}`;
}

function isAnimated(output: NodeOutput): boolean {
  const flag = output.animated;
  if (Array.isArray(flag)) return flag.some(Boolean);
  return Boolean(flag);
}

/**
 * Turn a history entry into artifacts, in three ordered sweeps: videos,
 * images, audio.
 *
 * - video: the node's class is a video save class, or the output is animated
 * - image: not a video node; when the graph declares image save nodes, only
 *   their outputs count
 * - audio: any node with `audio`/`audios` files
 *
 * When nothing matched, every node's `videos|images|audio|audios` files are
 * taken as they are. That sweep may pick up intermediate outputs.
 */
export function collectArtifacts(
  entry: HistoryEntry,
  graph: NodeGraph,
  baseUrl: string,
  saveClasses: SaveNodeClasses = DEFAULT_SAVE_CLASSES,
): MediaArtifact[] {
  const workflow = new WorkflowGraph(graph);
  const imageNodes = workflow.find_nodes_by_class(saveClasses.image);
  const videoNodes = workflow.find_nodes_by_class(saveClasses.video);
  const outputs = Object.entries(entry.outputs);

  const make = (file: OutputFile, kind: ArtifactKind): MediaArtifact => ({
    url: viewUrl(baseUrl, file),
    filename: file.filename,
    subfolder: file.subfolder,
    kind,
    mimeType: guessMimeType(file.filename, kind),
  });

  const artifacts: MediaArtifact[] = [];
  const isVideoNode = (nodeId: string, output: NodeOutput) =>
    videoNodes.has(nodeId) || isAnimated(output);

  for (const [nodeId, output] of outputs) {
    if (!isVideoNode(nodeId, output)) continue;
    const files = output.videos ?? output.images ?? [];
    for (const file of files) artifacts.push(make(file, ArtifactKind.VIDEO));
  }

  for (const [nodeId, output] of outputs) {
    if (isVideoNode(nodeId, output) || !output.images) continue;
    if (imageNodes.size > 0 && !imageNodes.has(nodeId)) continue;
    for (const file of output.images) artifacts.push(make(file, ArtifactKind.IMAGE));
  }

  for (const [, output] of outputs) {
    const files = output.audio ?? output.audios ?? [];
    for (const file of files) artifacts.push(make(file, ArtifactKind.AUDIO));
  }

  if (artifacts.length > 0) return artifacts;

  debug('[client]', 'No media collected via save-node classes, trying raw outputs');
  for (const [, output] of outputs) {
    for (const key of OUTPUT_KEYS) {
      const files = output[key];
      if (!files) continue;
      const kind =
        key === 'videos' || isAnimated(output)
          ? ArtifactKind.VIDEO
          : ArtifactKind.fromOutputKey(key) ?? ArtifactKind.IMAGE;
      for (const file of files) artifacts.push(make(file, kind));
    }
  }
  return artifacts;
}
