import { createContainer, InjectionMode, asValue, asClass, asFunction } from 'awilix';
import pino from 'pino';
import { env } from './env';
import LightClient, { type ILightClient } from './services/light-client';
import CellDepResolver from './services/cell-deps';
import { KeystoreSigner, RawKeySigner } from './services/signer';
import WalletService from './services/wallet';
import DaoService from './services/dao';

export interface Cradle {
  env: typeof env;
  logger: pino.BaseLogger;
  lightClient: ILightClient;
  cellDeps: CellDepResolver;
  rawKeySigner: RawKeySigner;
  keystoreSigner: KeystoreSigner | null;
  walletService: WalletService;
  daoService: DaoService;
}

const container = createContainer<Cradle>({
  injectionMode: InjectionMode.PROXY,
  strict: true,
});

container.register({
  env: asValue(env),
  logger: asValue(pino({ level: env.LOGGER_LEVEL })),
  lightClient: asClass(LightClient).singleton(),
  cellDeps: asClass(CellDepResolver).singleton(),
  rawKeySigner: asFunction(({ env }: Cradle) => new RawKeySigner(env.WALLET_PRIVATE_KEYS)).singleton(),
  keystoreSigner: asFunction(({ env }: Cradle) =>
    env.KEYSTORE_DIR ? new KeystoreSigner({ keystoreDir: env.KEYSTORE_DIR }) : null,
  ).singleton(),
  walletService: asClass(WalletService).singleton(),
  daoService: asClass(DaoService).singleton(),
});

export default container;
