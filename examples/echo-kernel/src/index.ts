import { createKernelApplication, defineKernelIdentity } from 'kernelkit';

import { EchoEngine } from './engine';

const identity = defineKernelIdentity({
  kernelName: 'echo',
  displayName: 'Echo',
  friendlyName: 'Echo',
  languageName: 'echo',
  kernelVersion: '0.1.0',
  description: 'A kernel that repeats every cell back to the notebook.',
  executable: 'echo-kernel'
});

const app = createKernelApplication(identity, (services) => {
  services.addSingleton('engine', ({ resolve }) => new EchoEngine(resolve('logger').child({ service: 'engine' })));
});

app.run(process.argv.slice(2)).catch((error: unknown) => {
  process.stderr.write(`${String(error)}\n`);
  process.exit(1);
});
