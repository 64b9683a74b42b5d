/**
 * Builders producing dump elements shaped like `pw-dump` output so suites can
 * describe graphs in a few lines.
 */

export interface NodeFixture {
  readonly id: number;
  readonly name?: string;
  readonly description?: string;
  readonly application?: string;
  readonly state?: string;
  /** Rate stored in `Format[0].audio.rate`. */
  readonly rate?: number;
  /** Rate stored in `EnumFormat[0].rate` (used when {@link rate} is absent). */
  readonly enumRate?: number;
  readonly volume?: number;
  readonly channelVolumes?: readonly number[];
  /** Overrides the generated `params` record entirely. */
  readonly params?: Record<string, unknown>;
}

export function nodeElement(fixture: NodeFixture): Record<string, unknown> {
  const props: Record<string, unknown> = {};
  if (fixture.name !== undefined) {
    props["node.name"] = fixture.name;
  }
  if (fixture.description !== undefined) {
    props["node.description"] = fixture.description;
  }
  if (fixture.application !== undefined) {
    props["application.name"] = fixture.application;
  }

  let params: Record<string, unknown> = {};
  if (fixture.params) {
    params = fixture.params;
  } else {
    if (fixture.rate !== undefined) {
      params.Format = [{ mediaType: "audio", audio: { format: "S32LE", rate: fixture.rate, channels: 2 } }];
    }
    if (fixture.enumRate !== undefined) {
      params.EnumFormat = [{ mediaType: "audio", rate: fixture.enumRate }];
    }
    if (fixture.volume !== undefined || fixture.channelVolumes !== undefined) {
      const entry: Record<string, unknown> = {};
      if (fixture.volume !== undefined) {
        entry.volume = fixture.volume;
      }
      if (fixture.channelVolumes !== undefined) {
        entry.channelVolumes = [...fixture.channelVolumes];
      }
      params.Props = [entry];
    }
  }

  const info: Record<string, unknown> = { props, params };
  if (fixture.state !== undefined) {
    info.state = fixture.state;
  }
  return { id: fixture.id, type: "PipeWire:Interface:Node", info };
}

export function linkElement(id: number, outputNodeId: number, inputNodeId: number): Record<string, unknown> {
  return {
    id,
    type: "PipeWire:Interface:Link",
    info: { "output-node-id": outputNodeId, "input-node-id": inputNodeId, state: "active" },
  };
}

/** Target sink used across suites: 48 kHz, unity volume. */
export const DAC_SINK: NodeFixture = {
  id: 40,
  name: "alsa_output.usb-Topping_DAC-00.analog-stereo",
  description: "Topping DAC Analog Stereo",
  state: "running",
  rate: 48_000,
  volume: 1,
  channelVolumes: [1, 1],
};
