import { describeConfigSourceContract } from "../../../ports/__tests__/source.contract"
import { EnvSource } from "../env-source"

describeConfigSourceContract({
  name: "EnvSource",
  make: async (_cwd, vars) => new EnvSource({ env: { ...vars }, prefix: "LOGLANE_" }),
})
