import { Container, Named, named, withLogger, type Initializer, type Logger } from "../index";

// Console-backed logger so the wiring shows up
const logger: Logger = {
  debug: (msg, meta) => console.log(`[debug] ${msg}`, meta ?? {}),
  info: (msg, meta) => console.log(`[info] ${msg}`, meta ?? {}),
  warn: (msg, meta) => console.warn(`[warn] ${msg}`, meta ?? {}),
  error: (msg, meta) => console.error(`[error] ${msg}`, meta ?? {}),
};

const container = new Container(withLogger(logger));

class HelloSrv {
  constructor(private word = "") {}
  hello() { return `Hello World ${this.word}`; }
}

class HelloCtl implements Initializer {
  @Named("helloService") private helloSrv!: HelloSrv;
  @Named("audit,optional") audit?: Logger;

  afterPropertySet() { logger.info("HelloCtl ready", { audit: this.audit !== undefined }); }
  hello() { return this.helloSrv.hello(); }
}

container.register(new HelloSrv("from keeper"), named("helloService"));
container.register(new HelloCtl(), named("helloCtl"));
container.freeze();

const ctl = container.get("helloCtl", HelloCtl);
logger.info(ctl.hello());

// Composition root: wired but not registered
class App {
  @Named("helloCtl") ctl!: HelloCtl;
}
const app = container.provide(new App());
logger.info(`app says: ${app.ctl.hello()}`);
logger.info(`registered beans: ${[...container.all().keys()].join(", ")}`);
