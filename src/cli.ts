import { cli } from 'cleye'
import { addCar, updateCar } from './commands/cars'
import { addCustomer, updateCustomer } from './commands/customers'
import { deleteCmd, get, list } from './commands/records'
import { rent, returnCar } from './commands/rentals'
import { stats } from './commands/stats'

cli({
  name: 'rental',
  version: '0.1.0',
  commands: [
    addCar,
    updateCar,
    addCustomer,
    updateCustomer,
    rent,
    returnCar,
    get,
    list,
    deleteCmd,
    stats
  ]
})
