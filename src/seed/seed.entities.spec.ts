import { DataSource } from 'typeorm';
import { SEED_ENTITIES } from './seed.entities';

class MetadataOnlyDataSource extends DataSource {
  build(): Promise<void> {
    return this.buildMetadatas();
  }
}

const metadataFor = async (entities: DataSource['options']['entities']) => {
  const dataSource = new MetadataOnlyDataSource({
    type: 'mysql',
    connectorPackage: 'mysql2',
    entities,
  });
  await dataSource.build();
  return dataSource.entityMetadatas.map((metadata) => metadata.tableName);
};

describe('SEED_ENTITIES', () => {
  it('builds TypeORM metadata without a database', async () => {
    await expect(metadataFor(SEED_ENTITIES)).resolves.toEqual(
      expect.arrayContaining([
        'staff_users',
        'packages',
        'exercises',
        'system_settings',
        'members',
        'invoices',
        'workout_plans',
        'workout_details',
      ]),
    );
  });

  it('needs the related entities of staff users and packages', async () => {
    const [staffUser, pkg, exercise, setting] = SEED_ENTITIES;

    await expect(
      metadataFor([staffUser, pkg, exercise, setting]),
    ).rejects.toThrow(
      'Entity metadata for StaffUser#workoutPlans was not found',
    );
  });
});
