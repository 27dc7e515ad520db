export { buildProviderFixtureResponse, type ProviderFixtureResponseOptions } from './chat/fixture-response';
export { createFakeTransport, type FakeTransport, type FakeTransportScript } from './chat/fakeTransport';
export { contentFrame, doneFrame, providerFrame, reasoningFrame } from './chat/providerFrames';
export {
  answer,
  content,
  createScriptedClient,
  reasoning,
  type ScriptedCall,
  type ScriptedClient,
  type ScriptStep,
} from './chat/scriptedClient';
