import { RoleRegistry } from "../../src/core/access";
import { genesis } from "../../src/core/state";
import { applyCommand } from "../../src/core/reducer";
import type {
  Command,
  ProtocolConfig,
  ProtocolEnv,
  ProtocolEvent,
  ProtocolState,
} from "../../src/core/types";
import { ToyDecryptionOracle, ToyFhe } from "../../src/fhe/toy";
import { asIdentity, asSeconds, type Identity } from "../../src/types/brands";

export const ADMIN = asIdentity("0x00000000000000000000000000000000000000a1");
export const PROVIDER = asIdentity("0x00000000000000000000000000000000000000b1");
export const PROVIDER_2 = asIdentity("0x00000000000000000000000000000000000000b2");
export const ORACLE = asIdentity("0x00000000000000000000000000000000000000c1");
export const STRANGER = asIdentity("0x00000000000000000000000000000000000000d1");

export const ALICE = asIdentity("contributor-alice");
export const BOB = asIdentity("contributor-bob");
export const CAROL = asIdentity("contributor-carol");

export const INSTANCE_ID =
  "0x1111111111111111111111111111111111111111111111111111111111111111" as const;

export const mkConfig = (over: Partial<ProtocolConfig> = {}): ProtocolConfig => ({
  instanceId: INSTANCE_ID,
  submissionCooldown: asSeconds(60n),
  decryptionCooldown: asSeconds(30n),
  ...over,
});

/** adjustable clock, unix seconds */
export const mkClock = (start = 1_000n) => {
  let t = start;
  return {
    now: () => t,
    advance: (s: bigint) => {
      t += s;
    },
  };
};

export type Harness = {
  env: ProtocolEnv;
  access: RoleRegistry;
  fhe: ToyFhe;
  oracle: ToyDecryptionOracle;
  clock: ReturnType<typeof mkClock>;
  state: ProtocolState;
};

export const mkHarness = (config: Partial<ProtocolConfig> = {}): Harness => {
  const access = new RoleRegistry({
    admin: [ADMIN],
    provider: [PROVIDER, PROVIDER_2],
    oracle: [ORACLE],
  });
  const fhe = new ToyFhe();
  const oracle = new ToyDecryptionOracle(fhe);
  const clock = mkClock();
  return {
    env: { access, fhe, oracle, config: mkConfig(config), now: clock.now },
    access,
    fhe,
    oracle,
    clock,
    state: genesis(),
  };
};

/** applies one command and keeps the resulting state on the harness */
export const run = (h: Harness, caller: Identity, cmd: Command): ProtocolEvent[] => {
  const { next, events } = applyCommand(h.state, { caller, cmd }, h.env);
  h.state = next;
  return events;
};

/** submit with a fresh cooldown window */
export const contribute = (
  h: Harness,
  identity: Identity,
  salary: bigint,
  score: bigint,
  caller: Identity = PROVIDER,
): ProtocolEvent[] => {
  const events = run(h, caller, {
    type: "submitContribution",
    identity,
    salary: h.fhe.encrypt(salary),
    score: h.fhe.encrypt(score),
  });
  h.clock.advance(h.env.config.submissionCooldown);
  return events;
};

/** the value `fn` throws, or undefined if it returns */
export const thrown = (fn: () => unknown): unknown => {
  try {
    fn();
  } catch (err) {
    return err;
  }
  return undefined;
};
