import { tessera } from "../src";

// Reads TESSERA_MONGO_URI and TESSERA_DATABASE.
const store = tessera.stores.mongo();
const engine = tessera.engine(store);

const User = tessera.document("User", {
  username: tessera.field(tessera.t.str, { unique: true }),
});

const Car = tessera.document("Car", {
  make: tessera.field(tessera.t.str),
  model: tessera.field(tessera.t.str),
  owner: tessera.reference(User),
});

const user = new User({ username: "fred" });
const car = new Car({ make: "Citroen", model: "C4", owner: user });

// Cascade writes the owner before the car.
(await engine.save(car, { cascade: true })).unwrap();

const { eq } = tessera.qfns;

const cars = (
  await engine.objects(Car).filter(eq("make", "Citroen")).dereference().fetch()
).unwrap();

car.model = "C5";
const updatedCar = (await engine.save(car)).unwrap();

console.log(cars.map((item) => `${item.make} ${item.model} (${item.owner?.username})`).join("\n"));
console.log(JSON.stringify(updatedCar));

(await engine.delete(user, { cascade: true })).unwrap();
await engine.close();
