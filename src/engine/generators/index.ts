export { Msws } from "./msws";
export { PcgXsh64Lcg, PcgXsl64Lcg } from "./pcg-lcg64";
export { PcgXsl128Mcg, PCG_MULTIPLIER_128 } from "./pcg-mcg128";
export { Mwp } from "./mwp";
export { Xsm32 } from "./xsm32";
export { Xsm64 } from "./xsm64";
