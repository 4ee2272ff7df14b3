/**
 * Tests history-output classification into media artifacts.
 */
import { collectArtifacts, guessMimeType, OCTET_STREAM, viewUrl } from '../src/client/Artifacts';
import { HistoryEntrySchema } from '../src/client/Protocol';
import { ArtifactKind, NodeGraph } from '../src/core/Types';

const BASE = 'http://engine.test';

const graph: NodeGraph = {
  '3': { class_type: 'KSampler', inputs: {} },
  '8': { class_type: 'PreviewImage', inputs: {} },
  '9': { class_type: 'SaveImage', inputs: {} },
  '12': { class_type: 'SaveVideo', inputs: {} },
};

function entry(outputs: unknown) {
  return HistoryEntrySchema.parse({ outputs });
}

function file(filename: string, subfolder = '') {
  return { filename, subfolder, type: 'output' };
}

describe('TestCollectArtifacts', () => {
  /** With a SaveImage node present, other image outputs are previews and skipped. */
  test('test_images_only_from_save_nodes', () => {
    const artifacts = collectArtifacts(
      entry({ '8': { images: [file('preview.png')] }, '9': { images: [file('final.png', 'run1')] } }),
      graph,
      BASE,
    );

    expect(artifacts).toEqual([
      {
        url: 'http://engine.test/view?filename=final.png&subfolder=run1&type=output',
        filename: 'final.png',
        subfolder: 'run1',
        kind: ArtifactKind.IMAGE,
        mimeType: 'image/png',
      },
    ]);
  });

  /** Without image save nodes every image output counts. */
  test('test_images_without_save_nodes', () => {
    const plain: NodeGraph = { '8': { class_type: 'PreviewImage', inputs: {} } };
    const artifacts = collectArtifacts(entry({ '8': { images: [file('a.jpg'), file('b.webp')] } }), plain, BASE);

    expect(artifacts.map((a) => [a.filename, a.kind, a.mimeType])).toEqual([
      ['a.jpg', ArtifactKind.IMAGE, 'image/jpeg'],
      ['b.webp', ArtifactKind.IMAGE, 'image/webp'],
    ]);
  });

  /** Video sweep runs first; audio sweep last. */
  test('test_sweep_order', () => {
    const artifacts = collectArtifacts(
      entry({
        '9': { images: [file('still.png')] },
        '12': { videos: [file('clip.mp4')] },
        '3': { audio: [file('track.flac')] },
      }),
      graph,
      BASE,
    );

    expect(artifacts.map((a) => `${a.kind}:${a.filename}:${a.mimeType}`)).toEqual([
      'video:clip.mp4:video/mp4',
      'image:still.png:image/png',
      'audio:track.flac:audio/flac',
    ]);
  });

  /** An animated image output is a video even from a non-video node. */
  test('test_animated_output_is_video', () => {
    const artifacts = collectArtifacts(
      entry({ '9': { images: [file('loop.webp')], animated: [false, true] } }),
      graph,
      BASE,
    );

    expect(artifacts).toHaveLength(1);
    expect(artifacts[0].kind).toBe(ArtifactKind.VIDEO);
    // .webp is not in the video table
    expect(artifacts[0].mimeType).toBe(OCTET_STREAM);
  });

  test('test_audios_key', () => {
    const artifacts = collectArtifacts(entry({ '3': { audios: [file('voice.mp3')] } }), graph, BASE);
    expect(artifacts.map((a) => [a.kind, a.mimeType])).toEqual([[ArtifactKind.AUDIO, 'audio/mpeg']]);
  });

  /** Nothing classified: every node's media fields are taken as they are. */
  test('test_fallback_scans_all_outputs', () => {
    const artifacts = collectArtifacts(entry({ '8': { images: [file('preview.png')] } }), graph, BASE);

    expect(artifacts.map((a) => [a.filename, a.kind])).toEqual([['preview.png', ArtifactKind.IMAGE]]);
  });

  test('test_empty_outputs', () => {
    expect(collectArtifacts(entry({}), graph, BASE)).toEqual([]);
    expect(collectArtifacts(HistoryEntrySchema.parse({}), graph, BASE)).toEqual([]);
  });

  test('test_custom_save_classes', () => {
    const custom: NodeGraph = { '5': { class_type: 'VHS_VideoCombine', inputs: {} } };
    const artifacts = collectArtifacts(
      entry({ '5': { images: [file('combined.mp4')] } }),
      custom,
      BASE,
      { image: ['SaveImage'], video: ['VHS_VideoCombine'] },
    );
    expect(artifacts.map((a) => [a.kind, a.mimeType])).toEqual([[ArtifactKind.VIDEO, 'video/mp4']]);
  });
});

describe('TestMime', () => {
  test('test_guess_mime_type', () => {
    expect(guessMimeType('A.PNG', ArtifactKind.IMAGE)).toBe('image/png');
    expect(guessMimeType('clip.mov', ArtifactKind.VIDEO)).toBe('video/quicktime');
    expect(guessMimeType('anim.gif', ArtifactKind.VIDEO)).toBe('image/gif');
    expect(guessMimeType('sound.wav', ArtifactKind.AUDIO)).toBe('audio/wav');
    expect(guessMimeType('noext', ArtifactKind.IMAGE)).toBe(OCTET_STREAM);
    expect(guessMimeType('x.mp4', ArtifactKind.IMAGE)).toBe(OCTET_STREAM);
  });

  test('test_view_url_encodes', () => {
    expect(viewUrl(BASE, { filename: 'a b.png', subfolder: 'x/y', type: 'temp' })).toBe(
      'http://engine.test/view?filename=a+b.png&subfolder=x%2Fy&type=temp',
    );
  });
});
