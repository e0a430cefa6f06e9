import { Logger, Module } from "@nestjs/common";
import { ConfigService } from "@nestjs/config";

import { CUSTODY_LEDGER } from "./custody.constants";
import { CustodyLedger } from "./custody-ledger";
import {
	InMemoryCustodyLedger,
	parseOpeningBalances,
} from "./in-memory-custody-ledger";

@Module({
	providers: [
		{
			provide: CUSTODY_LEDGER,
			inject: [ConfigService],
			useFactory: (cfg: ConfigService): CustodyLedger => {
				const openingBalances = parseOpeningBalances(
					cfg.get<string>("LEDGER_OPENING_BALANCES"),
				);
				Logger.log(
					`Seeding custody ledger with ${openingBalances.length} account(s)`,
					"CustodyModule",
				);
				return new InMemoryCustodyLedger(openingBalances);
			},
		},
	],
	exports: [CUSTODY_LEDGER],
})
export class CustodyModule {}
