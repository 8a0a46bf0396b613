import { GlobalConfig } from "./config.js";
import { drizzle } from 'drizzle-orm/libsql';

// DI to pass global context / config items around classes
export class Context {
  public db: ReturnType<typeof drizzle>
  public config: GlobalConfig

  constructor(public opts: unknown) {
    this.config = GlobalConfig.parse(opts)

    const filename = this.config["db-filename"]
    this.db = drizzle(filename === ':memory:' ? filename : 'file:' + filename)
  }
}
