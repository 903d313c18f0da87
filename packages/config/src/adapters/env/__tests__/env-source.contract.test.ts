import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async () => ({
    source: new EnvSource({
      env: { APP_HTTP_PORT: "8080", OTHER: "ignored" },
      prefix: "APP_",
      mapKey: (key) => key.toLowerCase().replaceAll("_", "."),
    }),
  }),
  setup: async () => {},
  expectedValue: () => ({ "http.port": "8080" }),
})
