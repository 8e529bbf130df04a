export { MidiFileRenderer, channelFor, type MidiFileRendererConfig } from "./MidiFileRenderer";
export { UstRenderer, melodyLine, UST_TICKS_PER_BEAT, type UstRendererConfig } from "./UstRenderer";
export { writeArtifacts, RenderError, type ArtifactOptions } from "./writeArtifacts";
